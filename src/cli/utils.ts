/**
 * CLI Utilities
 *
 * Exit codes, error reporting, terminal detection and argument parsers
 * shared by the `customs-sync` commands.
 *
 * @module cli/utils
 */

import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import {
  AppError,
  ConfigurationError,
  DatabaseError,
  StorageUnavailableError,
  ValidationError,
} from '../utils/errors.js';

// =============================================================================
// Exit Codes
// =============================================================================

export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  VALIDATION_ERROR: 2,
  STORAGE_ERROR: 3,
  CONFIG_ERROR: 4,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * 0 when the run counted no errors, 1 otherwise
 */
export function exitCodeFor(errors: number): ExitCode {
  return errors === 0 ? ExitCodes.SUCCESS : ExitCodes.FAILURE;
}

export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof ConfigurationError) {
    return ExitCodes.CONFIG_ERROR;
  }
  if (error instanceof ValidationError) {
    return ExitCodes.VALIDATION_ERROR;
  }
  if (error instanceof StorageUnavailableError || error instanceof DatabaseError) {
    return ExitCodes.STORAGE_ERROR;
  }
  return ExitCodes.FAILURE;
}

// =============================================================================
// Terminal
// =============================================================================

/**
 * Determines if color output should be used
 */
export function shouldUseColor(): boolean {
  if (process.env.NO_COLOR !== undefined) return false;
  if (process.env.TERM === 'dumb') return false;
  if (!process.stdout.isTTY) return false;
  return true;
}

/**
 * Determines if the terminal supports interactive features
 *
 * Used to decide whether to show spinners.
 */
export function isInteractive(): boolean {
  return process.stdout.isTTY === true;
}

// =============================================================================
// Error Handling
// =============================================================================

/**
 * Report a command failure and return the exit code for it
 */
export function reportError(error: unknown, json: boolean = false): ExitCode {
  const message = error instanceof Error ? error.message : String(error);
  const code = error instanceof AppError ? error.code : undefined;

  if (json) {
    console.log(
      JSON.stringify(
        {
          success: false,
          error: {
            message,
            code: code ?? 'UNKNOWN',
          },
        },
        null,
        2
      )
    );
  } else {
    console.error(chalk.red(`Error: ${message}`));
    if (code) {
      console.error(chalk.dim(`Code: ${code}`));
    }
  }

  return exitCodeForError(error);
}

// =============================================================================
// Argument Parsers
// =============================================================================

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseYear(value: string): number {
  const parsed = Number(value);
  if (!/^\d{4}$/.test(value) || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Must be a four-digit year.');
  }
  return parsed;
}

// =============================================================================
// Formatting
// =============================================================================

export function formatCount(value: number, color: (text: string) => string = (text) => text): string {
  return value === 0 ? chalk.dim('0') : color(String(value));
}
