import pino from 'pino';
import { config } from '../config/index.js';

export const loggerOptions = {
  level: config.server.logLevel,
  transport:
    config.server.nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
};

export const logger = pino(loggerOptions);
