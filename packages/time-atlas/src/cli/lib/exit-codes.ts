/**
 * Process exit codes and error classification
 *
 * @module cli/lib/exit-codes
 */

import { isDataUnavailableError, isInputInvalidError } from '../../core/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  UNEXPECTED_ERROR: 1,
  INPUT_ERROR: 2,
  CONFIG_ERROR: 3,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for an error thrown while running a command
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (isDataUnavailableError(error)) {
    return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
  if (isInputInvalidError(error)) {
    return EXIT_CODES.INPUT_ERROR;
  }
  return EXIT_CODES.UNEXPECTED_ERROR;
}

/**
 * Human-readable description of an error
 */
export function describeError(error: unknown): string {
  if (isDataUnavailableError(error) || isInputInvalidError(error)) {
    return error.toLogString();
  }
  return error instanceof Error ? error.message : String(error);
}
