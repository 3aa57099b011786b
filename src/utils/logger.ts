import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info';

const baseOptions: LoggerOptions = {
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Redact sensitive fields if they accidentally get logged
  redact: {
    paths: ['*.password', '*.connectionString', '*.databaseUrl', '*.sourceDatabaseUrl', '*.secret'],
    censor: '[REDACTED]',
  },
};

/**
 * Structured logger using pino
 *
 * Configuration:
 * - LOG_LEVEL environment variable controls verbosity (trace, debug, info, warn, error, fatal)
 * - ISO timestamps for consistent time formatting
 * - JSON format for structured logging
 * - Connection strings and credentials must never be logged
 */
export const logger = pino({ ...baseOptions, level: LOG_LEVEL });

/**
 * Logger writing to stderr, so command output on stdout stays parseable
 */
export function createStderrLogger(level: string): Logger {
  return pino({ ...baseOptions, level }, pino.destination(2));
}

export type { Logger };
