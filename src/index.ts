import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { buildApp } from './app.js';
import { PdfTextExtractor } from './services/document/PdfTextExtractor.js';
import { OpenAILLMService } from './services/llm/OpenAILLMService.js';
import { ExtractionInvoker } from './services/extraction/ExtractionInvoker.js';
import { ExtractionPipeline } from './services/extraction/ExtractionPipeline.js';

logger.info('Initializing services...');

try {
  const llmService = new OpenAILLMService();
  const pipeline = new ExtractionPipeline(new PdfTextExtractor(), new ExtractionInvoker(llmService));

  const fastify = await buildApp({ pipeline, llmService });

  logger.info({ provider: config.llm.provider, model: config.llm.model }, 'Services initialized');

  const shutdown = async () => {
    logger.info('Shutting down gracefully...');
    try {
      await fastify.close();
      logger.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  await fastify.listen({
    port: config.server.port,
    host: config.server.host,
  });
  logger.info(`Server listening on port ${config.server.port}`);
} catch (error) {
  logger.error({ error }, 'Server failed to start');
  process.exit(1);
}
