// ============================================
// CAPITOL - Simulation Logger
// ============================================

import { pino, type Logger } from 'pino';
import { env, isDevelopment, isTest } from '../config/env.js';

export const logger: Logger = pino({
  name: 'capitol',
  level: env.LOG_LEVEL ?? (isTest() ? 'silent' : 'info'),
  ...(isDevelopment() && {
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  }),
});

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
