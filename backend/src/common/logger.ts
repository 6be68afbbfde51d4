/**
 * Logging
 *
 * One pino root logger shared by Fastify and the jobs. Services receive the
 * narrow `Logger` interface so tests can pass plain mocks.
 */

import { pino, type Logger as PinoLogger } from 'pino';
import { env } from '../config/env.js';

export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug?: (obj: object, msg?: string) => void;
}

export const rootLogger = pino({
  level: env.LOG_LEVEL,
  base: { service: 'model-promotion' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function moduleLogger(module: string): PinoLogger {
  return rootLogger.child({ module });
}
