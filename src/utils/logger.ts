/**
 * Logging configuration using Pino.
 */

import { pino, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

const LEVELS = new Set(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);

function resolveLevel(level: string | undefined): string {
  const normalized = (level ?? 'info').toLowerCase();
  return LEVELS.has(normalized) ? normalized : 'info';
}

/**
 * Pino options, shared with Fastify's request logger.
 * Pretty output everywhere except production and tests.
 */
export function loggerOptions(level: string | undefined = process.env.LOG_LEVEL): LoggerOptions {
  const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';
  return {
    level: resolveLevel(level),
    transport: pretty
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
}

export function createLogger(level?: string): Logger {
  return pino(loggerOptions(level));
}

/**
 * Shared logger for modules that are not handed one explicitly.
 */
export const logger = createLogger();
