import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { LLMTransportError, StructuralValidationError } from '../../utils/errors.js';
import type { ExtractedInstance, TypeDefinition } from '../../types/schema.types.js';
import { renderJsonSchema } from '../schema/JsonSchemaRenderer.js';
import { validateInstance } from '../schema/InstanceValidator.js';
import type { GenerateOptions, LLMService } from './LLMService.interface.js';
import { OpenAIClientFactory } from './OpenAIClientFactory.js';

export interface ModelSettings {
  model: string;
  temperature: number;
  maxTokens?: number;
}

export const toolNameFor = (definition: TypeDefinition): string =>
  definition.name.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, 64) || 'Ext';

export function buildToolRequest(
  prompt: string,
  definition: TypeDefinition,
  settings: ModelSettings
): ChatCompletionCreateParamsNonStreaming {
  const name = toolNameFor(definition);

  const request: ChatCompletionCreateParamsNonStreaming = {
    model: settings.model,
    messages: [{ role: 'user', content: prompt }],
    temperature: settings.temperature,
    tools: [
      {
        type: 'function',
        function: {
          name,
          description: `Record the data extracted from the document as ${definition.name}`,
          parameters: renderJsonSchema(definition),
        },
      },
    ],
    tool_choice: { type: 'function', function: { name } },
  };

  if (settings.maxTokens !== undefined) {
    request.max_tokens = settings.maxTokens;
  }

  return request;
}

const parseArguments = (raw: string, source: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new StructuralValidationError(`Model returned invalid JSON in ${source}`, {
      raw: raw.slice(0, 500),
      reason: error instanceof Error ? error.message : String(error),
    });
  }
};

/**
 * Pulls the structured payload out of a completion: the forced tool call's
 * arguments, or JSON message content from backends that answer inline.
 */
export function readStructuredOutput(completion: ChatCompletion, definition: TypeDefinition): unknown {
  const choice = completion.choices[0];
  if (!choice) {
    throw new StructuralValidationError('Model returned no choices');
  }

  const { message } = choice;
  if (message.refusal) {
    throw new StructuralValidationError(`Model refused the request: ${message.refusal}`);
  }

  const name = toolNameFor(definition);
  const toolCall = message.tool_calls?.find(call => call.type === 'function' && call.function.name === name);

  if (toolCall) {
    return parseArguments(toolCall.function.arguments, 'tool arguments');
  }

  if (message.content?.trim()) {
    return parseArguments(message.content, 'message content');
  }

  throw new StructuralValidationError(
    choice.finish_reason === 'length'
      ? 'Model output was truncated before any structured result'
      : 'Model returned no structured output',
    { finishReason: choice.finish_reason }
  );
}

export class OpenAILLMService implements LLMService {
  private injectedClient?: OpenAI;
  private settings: ModelSettings;

  constructor(client?: OpenAI, settings?: ModelSettings) {
    this.injectedClient = client;
    this.settings = settings ?? {
      model: config.llm.model,
      temperature: config.llm.temperature,
      maxTokens: config.llm.maxTokens,
    };
  }

  /** Resolved on first use, so a missing API key surfaces per request rather than at startup. */
  private get client(): OpenAI {
    return this.injectedClient ?? OpenAIClientFactory.getClient();
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch {
      return false;
    }
  }

  async generateStructured(
    prompt: string,
    definition: TypeDefinition,
    options: GenerateOptions = {}
  ): Promise<ExtractedInstance> {
    logger.debug(
      { model: this.settings.model, typeName: definition.name, promptLength: prompt.length },
      'Sending structured extraction request'
    );

    const client = this.client;

    let completion: ChatCompletion;
    try {
      completion = await client.chat.completions.create(buildToolRequest(prompt, definition, this.settings), {
        signal: options.signal,
      });
    } catch (error) {
      if (error instanceof OpenAI.APIError) {
        throw new LLMTransportError(error.message, { status: error.status });
      }
      throw new LLMTransportError(error instanceof Error ? error.message : 'LLM request failed');
    }

    logger.debug(
      { model: completion.model, tokensUsed: completion.usage?.total_tokens },
      'Structured extraction response received'
    );

    return validateInstance(readStructuredOutput(completion, definition), definition);
  }
}
