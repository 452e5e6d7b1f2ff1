/**
 * Error types surfaced to API callers.
 *
 * Sentiment-path failures never reach this module: providers absorb them and
 * the resolver always produces a result. Only bad input and storage failures
 * propagate to the router.
 */

export class ValidationError extends Error {
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
