import { logger } from '../../utils/logger.js';
import { ConfigurationError, LLMTransportError, StructuralValidationError } from '../../utils/errors.js';
import type { ExtractedInstance, TypeDefinition } from '../../types/schema.types.js';
import type { GenerateOptions, LLMService } from '../llm/LLMService.interface.js';
import { EXTRACTION_PROMPT } from '../llm/prompts/base-extraction.js';

export class ExtractionInvoker {
  constructor(private llmService: LLMService) {}

  /** Issues exactly one structured request. There is no retry. */
  async invoke(text: string, definition: TypeDefinition, options: GenerateOptions = {}): Promise<ExtractedInstance> {
    const prompt = EXTRACTION_PROMPT(text);

    try {
      return await this.llmService.generateStructured(prompt, definition, options);
    } catch (error) {
      if (error instanceof StructuralValidationError) {
        logger.warn({ typeName: definition.name, details: error.details }, 'Model output failed validation');
        throw error;
      }
      if (error instanceof ConfigurationError) {
        logger.error({ typeName: definition.name, message: error.message }, 'LLM backend is not configured');
        throw error;
      }
      if (error instanceof LLMTransportError) {
        logger.error({ typeName: definition.name, details: error.details }, 'LLM backend request failed');
        throw error;
      }
      logger.error({ error, typeName: definition.name }, 'Unexpected LLM failure');
      throw new LLMTransportError(error instanceof Error ? error.message : 'LLM request failed', error);
    }
  }
}
