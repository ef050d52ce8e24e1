// Shared pino logger
// Fastify uses this instance; services take child loggers from it

import { pino, type Logger } from 'pino';
import { env } from './env.js';

export type { Logger } from 'pino';

export function createLogger(level: string = env.LOG_LEVEL): Logger {
  if (env.NODE_ENV === 'production') {
    return pino({ level });
  }

  return pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  });
}

export const silentLogger: Logger = pino({ level: 'silent' });
