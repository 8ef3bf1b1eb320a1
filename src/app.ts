import Fastify from 'fastify';
import multipart from '@fastify/multipart';
import { config } from './config/index.js';
import { logger, loggerOptions } from './utils/logger.js';
import { registerRoutes } from './api/routes.js';
import type { ExtractionPipeline } from './services/extraction/ExtractionPipeline.js';
import type { LLMService } from './services/llm/LLMService.interface.js';

export interface AppDependencies {
  pipeline: ExtractionPipeline;
  llmService: LLMService;
}

export async function buildApp({ pipeline, llmService }: AppDependencies) {
  const fastify = Fastify({
    logger: loggerOptions,
  });

  await fastify.register(multipart, {
    limits: {
      fileSize: config.upload.maxUploadSizeMB * 1024 * 1024,
      files: 1,
    },
  });

  await registerRoutes(fastify, pipeline, llmService);

  fastify.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    logger.error({ error, url: request.url, statusCode }, 'Request error');
    reply.code(statusCode).send({
      error: error.code ?? 'INTERNAL_ERROR',
      message: error.message,
    });
  });

  return fastify;
}
