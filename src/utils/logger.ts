// Shared pino logger
// The same instance is handed to Fastify so request logs and service logs share one stream

import { pino, type Logger, type LoggerOptions } from 'pino';
import { env } from '../env.js';

export type { Logger };

export function createLogger(level: string = env.LOG_LEVEL, nodeEnv: string = env.NODE_ENV): Logger {
  const options: LoggerOptions = {
    level: nodeEnv === 'test' ? 'silent' : level,
    redact: ['password', '*.password', 'apiKey', '*.apiKey'],
  };

  if (nodeEnv !== 'production' && nodeEnv !== 'test') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    };
  }

  return pino(options);
}

export const logger = createLogger();
