import { config } from '../../config/index.js';
import type { LLMService } from '../../services/llm/LLMService.interface.js';

export function createHealthHandler(llmService: LLMService) {
  return async () => {
    const llmOk = await llmService.testConnection();

    return {
      status: llmOk ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      environment: config.server.nodeEnv,
      services: {
        llm: llmOk,
      },
    };
  };
}
