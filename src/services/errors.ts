/**
 * Error classes for SearchService
 */

/**
 * Base class for search errors
 */
export abstract class SearchError extends Error {
  public readonly retryable: boolean;

  constructor(message: string, retryable: boolean = false) {
    super(message);
    this.name = this.constructor.name;
    this.retryable = retryable;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown when search parameters fail validation
 * Not retryable - client must fix input
 */
export class SearchValidationError extends SearchError {
  constructor(
    message: string,
    public readonly validationErrors: string[] = []
  ) {
    super(message, false);
  }
}
