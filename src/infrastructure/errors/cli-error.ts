/**
 * Base CLI error class with exit code support
 */
export class CliError extends Error {
  public readonly exitCode: number;

  constructor(message: string, exitCode: number = 1, cause: Error | null = null) {
    super(message);
    this.name = this.constructor.name;
    this.exitCode = exitCode;
    if (cause) {
      this.cause = cause;
    }
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { error: string; exitCode: number } {
    return {
      error: this.message,
      exitCode: this.exitCode,
    };
  }
}
