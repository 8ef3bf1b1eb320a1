export const extractErrorSchema = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    message: { type: 'string' },
    details: {},
  },
  required: ['error', 'message'],
} as const;

export const rootResponseSchema = {
  type: 'object',
  properties: {
    status: { type: 'string' },
  },
  required: ['status'],
} as const;

export const healthResponseSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['ok', 'degraded'] },
    timestamp: { type: 'string' },
    environment: { type: 'string' },
    services: {
      type: 'object',
      properties: {
        llm: { type: 'boolean' },
      },
    },
  },
  required: ['status', 'timestamp', 'services'],
} as const;
