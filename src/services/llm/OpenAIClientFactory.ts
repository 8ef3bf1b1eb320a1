import OpenAI from 'openai';
import { config } from '../../config/index.js';
import { ConfigurationError } from '../../utils/errors.js';

const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

export class OpenAIClientFactory {
  private static instance: OpenAI | null = null;

  static getClient(): OpenAI {
    if (this.instance) {
      return this.instance;
    }

    if (!config.llm.apiKey) {
      const envVar = config.llm.provider === 'openai' ? 'OPENAI_API_KEY' : 'GROQ_API_KEY';
      throw new ConfigurationError(`${envVar} is not set`);
    }

    const clientConfig: { apiKey: string; baseURL?: string; timeout: number; maxRetries: number } = {
      apiKey: config.llm.apiKey,
      timeout: config.llm.timeoutMs,
      maxRetries: 0,
    };

    if (config.llm.baseURL) {
      clientConfig.baseURL = config.llm.baseURL;
    } else if (config.llm.provider === 'groq') {
      clientConfig.baseURL = GROQ_BASE_URL;
    }

    this.instance = new OpenAI(clientConfig);
    return this.instance;
  }

  static reset(): void {
    this.instance = null;
  }
}
