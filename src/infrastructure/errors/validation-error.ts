import { CliError } from './cli-error.js';

/**
 * Invalid command-line input
 */
export class ValidationError extends CliError {
  constructor(message: string, cause: Error | null = null) {
    super(message, 2, cause);
  }
}
