import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

/**
 * Paths scrubbed from every log line.
 */
export const REDACT_PATHS = [
  'password',
  'passwordHash',
  'token',
  '*.password',
  '*.passwordHash',
  '*.token',
  'req.headers.cookie',
  'res.headers["set-cookie"]',
];

/**
 * JSON logger on stdout. Silent under Vitest or NODE_ENV=test; level from
 * LOG_LEVEL. Reads env directly so it is safe to call at module scope.
 */
export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === 'true';
  const nodeEnv = process.env.NODE_ENV ?? 'development';

  return pino({
    level: process.env.LOG_LEVEL ?? 'info',
    enabled: !(isVitest || nodeEnv === 'test'),
    base: { ...bindings, service: 'medical-records' },
    messageKey: 'msg',
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
  });
}

/** For tests: keeps the Logger type, emits nothing. */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

export const logger = makeLogger();
