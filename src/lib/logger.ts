/**
 * Pino logger factory
 *
 * JSON lines on stdout. Silent under Vitest or NODE_ENV=test.
 * Components take a child logger bound to their name.
 */

import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

const REDACT_PATHS = [
  'token',
  'apiKey',
  '*.token',
  '*.apiKey',
  'headers.authorization',
];

export function createLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === 'true';
  const nodeEnv = process.env.NODE_ENV ?? 'development';
  const level = process.env.LOG_LEVEL ?? 'info';

  return pino({
    level,
    enabled: !isVitest && nodeEnv !== 'test',
    base: { ...bindings, service: 'mealfinder-relay' },
    messageKey: 'msg',
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
  });
}

/**
 * For tests - keeps the Logger type, emits nothing
 */
export function createNoopLogger(): Logger {
  return pino({ enabled: false });
}
