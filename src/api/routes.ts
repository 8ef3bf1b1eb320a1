import type { FastifyInstance } from 'fastify';
import { createExtractHandler } from './handlers/extract.handler.js';
import { createHealthHandler } from './handlers/health.handler.js';
import { extractErrorSchema, healthResponseSchema, rootResponseSchema } from './schemas/extract.schema.js';
import type { ExtractionPipeline } from '../services/extraction/ExtractionPipeline.js';
import type { LLMService } from '../services/llm/LLMService.interface.js';

export async function registerRoutes(fastify: FastifyInstance, pipeline: ExtractionPipeline, llmService: LLMService) {
  fastify.get('/', {
    schema: {
      response: {
        200: rootResponseSchema,
      },
    },
    handler: async () => ({ status: 'running' }),
  });

  fastify.get('/health', {
    schema: {
      response: {
        200: healthResponseSchema,
      },
    },
    handler: createHealthHandler(llmService),
  });

  fastify.post('/extract', {
    schema: {
      response: {
        400: extractErrorSchema,
        422: extractErrorSchema,
        500: extractErrorSchema,
      },
    },
    handler: createExtractHandler(pipeline),
  });
}
