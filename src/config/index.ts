import 'dotenv/config';
import { ZodError } from 'zod';
import { configSchema, type Config } from './validation.js';

const DEFAULT_MODELS: Record<Config['llm']['provider'], string> = {
  groq: 'llama-3.3-70b-versatile',
  openai: 'gpt-4o-mini',
};

const parseNumber = (value: string | undefined, parse: (raw: string) => number): number | undefined =>
  value ? parse(value) : undefined;

function loadConfig(): Config {
  const provider = process.env.LLM_PROVIDER === 'openai' ? 'openai' : 'groq';

  const rawConfig = {
    server: {
      nodeEnv: process.env.NODE_ENV,
      port: parseNumber(process.env.PORT, raw => parseInt(raw, 10)),
      host: process.env.HOST || undefined,
      logLevel: process.env.LOG_LEVEL,
    },
    llm: {
      provider: process.env.LLM_PROVIDER || undefined,
      apiKey: (provider === 'openai' ? process.env.OPENAI_API_KEY : process.env.GROQ_API_KEY) || '',
      model: process.env.LLM_MODEL || DEFAULT_MODELS[provider],
      baseURL: process.env.LLM_BASE_URL || undefined,
      temperature: parseNumber(process.env.LLM_TEMPERATURE, parseFloat),
      maxTokens: parseNumber(process.env.LLM_MAX_TOKENS, raw => parseInt(raw, 10)),
      timeoutMs: parseNumber(process.env.LLM_TIMEOUT_MS, raw => parseInt(raw, 10)),
    },
    upload: {
      maxUploadSizeMB: parseNumber(process.env.MAX_UPLOAD_SIZE_MB, parseFloat),
    },
    output: {
      path: process.env.OUTPUT_PATH || undefined,
    },
  };

  try {
    return configSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('\n❌ Invalid configuration:\n');
      error.issues.forEach(issue => {
        const field = issue.path.join('.');
        console.error(`  ${field}: ${issue.message}`);
      });
      console.error('\nCheck .env file and compare with .env.example\n');
    } else {
      console.error('Config error:', error);
    }
    process.exit(1);
  }
}

export const config = loadConfig();
