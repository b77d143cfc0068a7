/**
 * Error thrown when harness configuration is invalid
 */

export class ValidationError extends Error {
  public readonly validationErrors: string[];

  constructor(message: string, validationErrors: string[], cause?: Error) {
    super(message, { cause });
    this.name = 'ValidationError';
    this.validationErrors = validationErrors;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ValidationError);
    }
  }
}
