import type { FastifyReply, FastifyRequest } from 'fastify';
import { logger } from '../../utils/logger.js';
import {
  ConfigurationError,
  EmptyDocumentError,
  LLMTransportError,
  StructuralValidationError,
  ValidationError,
} from '../../utils/errors.js';
import type { ExtractionPipeline } from '../../services/extraction/ExtractionPipeline.js';
import {
  DEFAULT_SCHEMA_DESCRIPTION,
  parseSchemaDescription,
} from '../../services/schema/SchemaDescriptionParser.js';

interface UploadedPdf {
  fileName: string;
  content: Buffer;
}

export function createExtractHandler(pipeline: ExtractionPipeline) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    let upload: UploadedPdf | undefined;
    let schemaField: string | undefined;

    for await (const part of request.parts()) {
      if (part.type === 'file') {
        if (part.fieldname === 'file' && !upload) {
          upload = { fileName: part.filename, content: await part.toBuffer() };
        } else {
          await part.toBuffer();
        }
      } else if (part.fieldname === 'schema' && typeof part.value === 'string') {
        schemaField = part.value;
      }
    }

    if (!upload) {
      return reply.code(400).send({
        error: 'VALIDATION_ERROR',
        message: 'No file uploaded',
      });
    }

    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableFinished) {
        controller.abort();
      }
    });

    try {
      if (!upload.fileName.toLowerCase().endsWith('.pdf')) {
        throw new ValidationError('Only PDF supported', { fileName: upload.fileName });
      }

      const description = parseSchemaDescription(schemaField ?? DEFAULT_SCHEMA_DESCRIPTION);

      logger.info({ fileName: upload.fileName, size: upload.content.length }, 'Received extraction request');

      const result = await pipeline.run(upload.content, description, { signal: controller.signal });
      return reply.code(200).send(result);
    } catch (error) {
      if (error instanceof ValidationError) {
        return reply.code(400).send({
          error: error.code,
          message: error.message,
          details: error.details,
        });
      }

      if (error instanceof EmptyDocumentError) {
        return reply.code(422).send({
          error: error.code,
          message: error.message,
        });
      }

      if (
        error instanceof LLMTransportError ||
        error instanceof StructuralValidationError ||
        error instanceof ConfigurationError
      ) {
        logger.error({ code: error.code, fileName: upload.fileName }, 'Extraction failed');
        return reply.code(500).send({
          error: error.code,
          message: error.message,
          details: error.details,
        });
      }

      throw error;
    }
  };
}
