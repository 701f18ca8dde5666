/**
 * Structured Logger
 *
 * - JSON output (pino), ISO timestamps
 * - Level from LOG_LEVEL (debug, info, warn, error, silent)
 * - Credentials redacted wherever they appear in the log context
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

const REDACT_PATHS = [
  'apiKey',
  'key',
  'token',
  'password',
  'secret',
  'googleMapsApiKey',
  '*.apiKey',
  '*.key',
  '*.token',
  '*.password',
  '*.secret',
  '*.googleMapsApiKey',
  'req.headers.authorization',
  'req.headers.cookie'
];

export function resolveLogLevel(value: string | undefined): LevelWithSilent {
  const level = LEVELS.find((l) => l === value);
  return level ?? 'info';
}

export function createLogger(level: LevelWithSilent = resolveLogLevel(process.env.LOG_LEVEL)): Logger {
  return pino({
    level,
    base: { service: 'restaurant-search-api' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label })
    },
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' }
  });
}

/**
 * Singleton logger instance
 * Configure via LOG_LEVEL environment variable
 */
export const logger = createLogger();

export type { Logger };
