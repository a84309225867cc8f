import { CliError } from './cli-error.js';

/**
 * Type guard for CliError
 */
function isCliError(error: unknown): error is CliError {
  return error instanceof CliError;
}

/**
 * Extracts an error message from an unknown error object
 * @param error - Error object
 * @param defaultMessage - Default message if extraction fails
 * @returns Error message string
 */
export function extractErrorMessage(error: unknown, defaultMessage: string = 'An error occurred'): string {
  if (!error) {
    return defaultMessage;
  }

  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return defaultMessage;
}

export interface ErrorOutput {
  write(chunk: string): unknown;
}

/**
 * Centralized error handler that reports an error and returns the exit code
 */
export function handleError(
  error: unknown,
  output: ErrorOutput = process.stderr,
  defaultExitCode: number = 1
): number {
  if (isCliError(error)) {
    output.write(`${error.message}\n`);
    return error.exitCode;
  }

  output.write(`${extractErrorMessage(error, 'An unexpected error occurred')}\n`);
  return defaultExitCode;
}
