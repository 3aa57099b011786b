/**
 * Error Handling Utilities
 *
 * Provides typed application errors and retry logic for transient failures.
 */

import { logger } from './logger.js';

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Database error
 */
export class DatabaseError extends AppError {
  constructor(message: string, public readonly sqlState?: string) {
    super(message, 'DATABASE_ERROR', 500);
  }
}

/**
 * Storage client could not be obtained or the connection was refused
 */
export class StorageUnavailableError extends AppError {
  constructor(message: string = 'Storage unavailable') {
    super(message, 'STORAGE_UNAVAILABLE', 503);
  }
}

/**
 * Validation error
 */
export class ValidationError extends AppError {
  public readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.field = field;
  }
}

/**
 * Raw payload that cannot be parsed into a key-value map
 */
export class MalformedPayloadError extends AppError {
  constructor(message: string) {
    super(message, 'MALFORMED_PAYLOAD', 422);
  }
}

/**
 * Invalid or missing configuration
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', 500, false);
  }
}

/**
 * Configuration for retry logic
 */
export interface RetryConfig {
  /** Maximum number of attempts */
  maxAttempts: number;
  /** Initial delay in milliseconds */
  initialDelayMs: number;
  /** Maximum delay in milliseconds */
  maxDelayMs: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier: number;
  /** Retry condition; timeouts only by default */
  shouldRetry?: (error: unknown) => boolean;
}

/**
 * Default retry configuration (1s, 2s, 4s, ...)
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

/**
 * Sleep for a given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * True when the error text carries a timeout marker
 * (`timeout`, `ETIMEOUT`, `ETIMEDOUT`, `Query read timeout`, ...)
 */
export function isTimeoutError(error: unknown): boolean {
  const text = errorText(error).toLowerCase();
  return text.includes('timeout') || text.includes('etimedout');
}

/**
 * True for a natural-key uniqueness conflict (SQLSTATE 23505)
 */
export function isUniqueViolation(error: unknown): boolean {
  if (error instanceof DatabaseError && error.sqlState === '23505') {
    return true;
  }
  return errorText(error).toLowerCase().includes('duplicate key');
}

/**
 * Execute a function with retry logic for transient failures
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {},
  context?: string
): Promise<T> {
  const cfg = { ...DEFAULT_RETRY_CONFIG, ...config };
  const shouldRetry = cfg.shouldRetry ?? isTimeoutError;

  let lastError: unknown;
  let delay = cfg.initialDelayMs;

  for (let attempt = 1; attempt <= cfg.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt === cfg.maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      logger.warn(
        {
          attempt,
          maxAttempts: cfg.maxAttempts,
          delay,
          context,
          error: errorText(error),
        },
        'Retrying after transient error'
      );

      await sleep(delay);
      delay = Math.min(delay * cfg.backoffMultiplier, cfg.maxDelayMs);
    }
  }

  throw lastError;
}
