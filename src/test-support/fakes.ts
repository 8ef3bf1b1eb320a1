import type { ExtractedInstance, TypeDefinition } from '../types/schema.types.js';
import type { GenerateOptions, LLMService } from '../services/llm/LLMService.interface.js';
import type { DocumentSource, ExtractedDocument } from '../services/document/DocumentSource.interface.js';
import { validateInstance } from '../services/schema/InstanceValidator.js';

export interface RecordedCall {
  prompt: string;
  definition: TypeDefinition;
  options?: GenerateOptions;
}

export type Respond = (prompt: string, definition: TypeDefinition, options?: GenerateOptions) => unknown;

/** In-process stand-in for the model: returns whatever `respond` produces (or resolves to), validated like a real backend. */
export class FakeLLMService implements LLMService {
  calls: RecordedCall[] = [];

  constructor(
    private respond: Respond,
    private healthy = true
  ) {}

  async generateStructured(
    prompt: string,
    definition: TypeDefinition,
    options?: GenerateOptions
  ): Promise<ExtractedInstance> {
    this.calls.push({ prompt, definition, options });
    return validateInstance(await this.respond(prompt, definition, options), definition);
  }

  async testConnection(): Promise<boolean> {
    return this.healthy;
  }
}

export class FakeDocumentSource implements DocumentSource {
  calls = 0;

  constructor(
    private text: string,
    private pageCount = 1
  ) {}

  async extractText(): Promise<ExtractedDocument> {
    this.calls++;
    return { text: this.text, pageCount: this.pageCount };
  }
}
