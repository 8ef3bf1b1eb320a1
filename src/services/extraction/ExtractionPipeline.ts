import { logger } from '../../utils/logger.js';
import { EmptyDocumentError, ValidationError } from '../../utils/errors.js';
import type { JsonObject, SchemaDescription, TypeDefinition } from '../../types/schema.types.js';
import type { DocumentSource } from '../document/DocumentSource.interface.js';
import type { GenerateOptions } from '../llm/LLMService.interface.js';
import { buildTypeDefinition } from '../schema/SchemaBuilder.js';
import { materialize } from '../schema/ResultMaterializer.js';
import type { ExtractionInvoker } from './ExtractionInvoker.js';

export class ExtractionPipeline {
  constructor(
    private documentSource: DocumentSource,
    private invoker: ExtractionInvoker
  ) {}

  async run(content: Buffer, description: SchemaDescription, options: GenerateOptions = {}): Promise<JsonObject> {
    if (Object.keys(description).length === 0) {
      throw new ValidationError('No fields defined');
    }

    const text = await this.extractText(content);
    return this.extract(text, buildTypeDefinition(description), options);
  }

  async runWithDefinition(
    content: Buffer,
    definition: TypeDefinition,
    options: GenerateOptions = {}
  ): Promise<JsonObject> {
    if (definition.fields.length === 0) {
      throw new ValidationError('No fields defined');
    }

    const text = await this.extractText(content);
    return this.extract(text, definition, options);
  }

  private async extractText(content: Buffer): Promise<string> {
    const document = await this.documentSource.extractText(content);

    if (!document.text.trim()) {
      throw new EmptyDocumentError('No text found', { pageCount: document.pageCount });
    }

    logger.debug({ pageCount: document.pageCount, textLength: document.text.length }, 'Document text extracted');
    return document.text;
  }

  private async extract(text: string, definition: TypeDefinition, options: GenerateOptions): Promise<JsonObject> {
    const startTime = Date.now();

    const instance = await this.invoker.invoke(text, definition, options);
    const result = materialize(instance, definition);

    logger.info(
      {
        typeName: definition.name,
        fieldCount: definition.fields.length,
        textLength: text.length,
        extractionTime: Date.now() - startTime,
      },
      'Extraction complete'
    );

    return result;
  }
}
