import type { ExtractedInstance, TypeDefinition } from '../../types/schema.types.js';

export interface GenerateOptions {
  signal?: AbortSignal;
}

/**
 * Chat-completion backend able to constrain its output to a type definition.
 * Implementations validate the output before returning it.
 */
export interface LLMService {
  generateStructured(prompt: string, definition: TypeDefinition, options?: GenerateOptions): Promise<ExtractedInstance>;
  testConnection(): Promise<boolean>;
}
