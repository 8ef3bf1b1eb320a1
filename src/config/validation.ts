import { z } from 'zod';

export const configSchema = z.object({
  server: z.object({
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    port: z.number().int().positive().default(3000),
    host: z.string().min(1).default('0.0.0.0'),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  }),
  llm: z.object({
    provider: z.enum(['groq', 'openai']).default('groq'),
    apiKey: z.string().default(''),
    model: z.string().min(1),
    baseURL: z.string().url().optional(),
    temperature: z.number().min(0).max(2).default(0),
    maxTokens: z.number().int().positive().optional(),
    timeoutMs: z.number().int().positive().default(60_000),
  }),
  upload: z.object({
    maxUploadSizeMB: z.number().positive().default(25),
  }),
  output: z.object({
    path: z.string().min(1).default('latest_output.json'),
  }),
});

export type Config = z.infer<typeof configSchema>;
