import { afterEach, describe, expect, it, vi } from 'vitest';
import OpenAI from 'openai';
import type { ChatCompletion, ChatCompletionMessageToolCall } from 'openai/resources/chat/completions';
import { ConfigurationError, LLMTransportError, StructuralValidationError } from '../../utils/errors.js';
import { buildTypeDefinition } from '../schema/SchemaBuilder.js';
import { renderJsonSchema } from '../schema/JsonSchemaRenderer.js';
import { OpenAIClientFactory } from './OpenAIClientFactory.js';
import { OpenAILLMService, buildToolRequest, readStructuredOutput, toolNameFor } from './OpenAILLMService.js';

const invoice = buildTypeDefinition({ vendor: 'str', items: [{ name: 'str', price: 'float' }] });

interface MessageFields {
  content?: string | null;
  refusal?: string | null;
  toolCalls?: ChatCompletionMessageToolCall[];
}

const completionWith = (
  fields: MessageFields,
  finishReason: ChatCompletion.Choice['finish_reason'] = 'tool_calls'
): ChatCompletion => ({
  id: 'chatcmpl-test',
  object: 'chat.completion',
  created: 0,
  model: 'test-model',
  choices: [
    {
      index: 0,
      finish_reason: finishReason,
      logprobs: null,
      message: {
        role: 'assistant',
        content: fields.content ?? null,
        refusal: fields.refusal ?? null,
        tool_calls: fields.toolCalls,
      },
    },
  ],
});

const toolCall = (name: string, args: string): ChatCompletionMessageToolCall => ({
  id: 'call_test',
  type: 'function',
  function: { name, arguments: args },
});

describe('toolNameFor', () => {
  it('keeps valid names and replaces other characters', () => {
    expect(toolNameFor(invoice)).toBe('Ext');
    expect(toolNameFor({ name: 'Invoice Data!', fields: [] })).toBe('Invoice_Data_');
  });
});

describe('buildToolRequest', () => {
  it('forces a single tool whose parameters are the rendered schema', () => {
    const request = buildToolRequest('Extract this', invoice, { model: 'test-model', temperature: 0 });

    expect(request).toEqual({
      model: 'test-model',
      messages: [{ role: 'user', content: 'Extract this' }],
      temperature: 0,
      tools: [
        {
          type: 'function',
          function: {
            name: 'Ext',
            description: 'Record the data extracted from the document as Ext',
            parameters: renderJsonSchema(invoice),
          },
        },
      ],
      tool_choice: { type: 'function', function: { name: 'Ext' } },
    });
    expect('max_tokens' in request).toBe(false);
  });

  it('sets max tokens only when configured', () => {
    const request = buildToolRequest('Extract this', invoice, { model: 'test-model', temperature: 0, maxTokens: 512 });
    expect(request.max_tokens).toBe(512);
  });
});

describe('readStructuredOutput', () => {
  it('parses the forced tool call arguments', () => {
    const completion = completionWith({ toolCalls: [toolCall('Ext', '{"vendor":"Acme Corp","items":[]}')] });
    expect(readStructuredOutput(completion, invoice)).toEqual({ vendor: 'Acme Corp', items: [] });
  });

  it('ignores tool calls for other tools', () => {
    const completion = completionWith({
      content: '{"vendor":"From content"}',
      toolCalls: [toolCall('Other', '{"vendor":"From other tool"}')],
    });
    expect(readStructuredOutput(completion, invoice)).toEqual({ vendor: 'From content' });
  });

  it('falls back to JSON message content', () => {
    const completion = completionWith({ content: '{"vendor":"Acme Corp"}' }, 'stop');
    expect(readStructuredOutput(completion, invoice)).toEqual({ vendor: 'Acme Corp' });
  });

  it('rejects arguments that are not JSON', () => {
    const completion = completionWith({ toolCalls: [toolCall('Ext', '{vendor: Acme')] });
    expect(() => readStructuredOutput(completion, invoice)).toThrow(StructuralValidationError);
    expect(() => readStructuredOutput(completion, invoice)).toThrowError('Model returned invalid JSON in tool arguments');
  });

  it('reports refusals as structural failures', () => {
    const completion = completionWith({ refusal: 'I cannot help with that' }, 'stop');
    expect(() => readStructuredOutput(completion, invoice)).toThrowError(
      'Model refused the request: I cannot help with that'
    );
  });

  it('reports truncated output', () => {
    const completion = completionWith({}, 'length');
    expect(() => readStructuredOutput(completion, invoice)).toThrowError(
      'Model output was truncated before any structured result'
    );
  });

  it('reports empty responses', () => {
    expect(() => readStructuredOutput(completionWith({}, 'stop'), invoice)).toThrowError(
      'Model returned no structured output'
    );
    expect(() => readStructuredOutput({ ...completionWith({}), choices: [] }, invoice)).toThrowError(
      'Model returned no choices'
    );
  });
});

describe('OpenAILLMService', () => {
  const settings = { model: 'test-model', temperature: 0 };
  const stubClient = () => new OpenAI({ apiKey: 'test-key', baseURL: 'http://127.0.0.1:9/v1', maxRetries: 0 });

  const failureOf = (promise: Promise<unknown>): Promise<unknown> =>
    promise.then(
      () => {
        throw new Error('expected the call to fail');
      },
      (error: unknown) => error
    );

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends the tool request with the abort signal and validates the arguments', async () => {
    const client = stubClient();
    const create = vi
      .spyOn(client.chat.completions, 'create')
      .mockResolvedValue(completionWith({ toolCalls: [toolCall('Ext', '{"vendor":"Acme Corp"}')] }));
    const controller = new AbortController();

    const instance = await new OpenAILLMService(client, settings).generateStructured('Extract this', invoice, {
      signal: controller.signal,
    });

    expect(instance).toEqual({ vendor: 'Acme Corp', items: [] });
    expect(create).toHaveBeenCalledTimes(1);
    expect(create).toHaveBeenCalledWith(buildToolRequest('Extract this', invoice, settings), {
      signal: controller.signal,
    });
  });

  it('rejects tool arguments that do not match the definition', async () => {
    const client = stubClient();
    vi.spyOn(client.chat.completions, 'create').mockResolvedValue(
      completionWith({ toolCalls: [toolCall('Ext', '{"vendor":42}')] })
    );

    await expect(new OpenAILLMService(client, settings).generateStructured('Extract this', invoice)).rejects.toThrow(
      StructuralValidationError
    );
  });

  it('maps rate limits to transport failures with the status', async () => {
    const client = stubClient();
    vi.spyOn(client.chat.completions, 'create').mockRejectedValue(
      new OpenAI.RateLimitError(429, { message: 'Rate limit reached' }, undefined, {})
    );

    const error = await failureOf(new OpenAILLMService(client, settings).generateStructured('Extract this', invoice));

    expect(error).toBeInstanceOf(LLMTransportError);
    expect(error).toMatchObject({ message: '429 Rate limit reached', details: { status: 429 } });
  });

  it('maps authentication failures to transport failures with the status', async () => {
    const client = stubClient();
    vi.spyOn(client.chat.completions, 'create').mockRejectedValue(
      new OpenAI.AuthenticationError(401, { message: 'Invalid API Key' }, undefined, {})
    );

    const error = await failureOf(new OpenAILLMService(client, settings).generateStructured('Extract this', invoice));

    expect(error).toBeInstanceOf(LLMTransportError);
    expect(error).toMatchObject({ details: { status: 401 } });
  });

  it('maps timeouts and other errors to transport failures', async () => {
    const client = stubClient();
    vi.spyOn(client.chat.completions, 'create')
      .mockRejectedValueOnce(new OpenAI.APIConnectionTimeoutError())
      .mockRejectedValueOnce(new TypeError('fetch failed'));
    const service = new OpenAILLMService(client, settings);

    const timeout = await failureOf(service.generateStructured('Extract this', invoice));
    const other = await failureOf(service.generateStructured('Extract this', invoice));

    expect(timeout).toBeInstanceOf(LLMTransportError);
    expect(timeout).toMatchObject({ message: 'Request timed out.' });
    expect(other).toBeInstanceOf(LLMTransportError);
    expect(other).toMatchObject({ message: 'fetch failed' });
  });

  it('starts without an API key and reports it on first use', async () => {
    const getClient = vi.spyOn(OpenAIClientFactory, 'getClient').mockImplementation(() => {
      throw new ConfigurationError('GROQ_API_KEY is not set');
    });

    const service = new OpenAILLMService(undefined, settings);
    expect(getClient).not.toHaveBeenCalled();

    await expect(service.generateStructured('Extract this', invoice)).rejects.toThrow(ConfigurationError);
    await expect(service.testConnection()).resolves.toBe(false);
  });
});
