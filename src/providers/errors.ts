/**
 * Error classes for embedding provider operations
 *
 * Every error carries a code and a retryable flag that drives the
 * provider's retry loop.
 */

/**
 * Redact API keys and long token-like strings from a message
 */
function sanitizeMessage(message: string): string {
  return message
    .replace(/sk-[a-zA-Z0-9_-]{20,}/g, "sk-***REDACTED***")
    .replace(/\b[a-zA-Z0-9]{40,}\b/g, "***REDACTED***");
}

/**
 * Base error class for all embedding-related errors
 */
export class EmbeddingError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;
  public override readonly cause?: Error;

  constructor(
    message: string,
    code: string = "EMBEDDING_ERROR",
    retryable: boolean = false,
    cause?: Error
  ) {
    super(sanitizeMessage(message));
    this.name = "EmbeddingError";
    this.code = code;
    this.retryable = retryable;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    if (cause && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Invalid or unauthorized API key. Not retryable.
 *
 * @example
 * ```typescript
 * if (error instanceof EmbeddingAuthenticationError) {
 *   logger.fatal("Check OPENAI_API_KEY");
 * }
 * ```
 */
export class EmbeddingAuthenticationError extends EmbeddingError {
  constructor(message: string, cause?: Error) {
    super(message, "AUTHENTICATION_ERROR", false, cause);
    this.name = "EmbeddingAuthenticationError";
  }
}

/**
 * Provider rate limit exceeded. Retried after `retryAfterMs` when the
 * provider sends a Retry-After header, with exponential backoff otherwise.
 */
export class EmbeddingRateLimitError extends EmbeddingError {
  public readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number, cause?: Error) {
    super(message, "RATE_LIMIT_ERROR", true, cause);
    this.name = "EmbeddingRateLimitError";
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Connection failures and 5xx responses. Retryable.
 */
export class EmbeddingNetworkError extends EmbeddingError {
  constructor(message: string, cause?: Error) {
    super(message, "NETWORK_ERROR", true, cause);
    this.name = "EmbeddingNetworkError";
  }
}

export class EmbeddingTimeoutError extends EmbeddingError {
  constructor(message: string, cause?: Error) {
    super(message, "TIMEOUT_ERROR", true, cause);
    this.name = "EmbeddingTimeoutError";
  }
}

/**
 * Invalid input or configuration. Not retryable.
 */
export class EmbeddingValidationError extends EmbeddingError {
  /** Parameter that failed validation, if known */
  public readonly parameterName?: string;

  constructor(message: string, parameterName?: string, cause?: Error) {
    super(message, "VALIDATION_ERROR", false, cause);
    this.name = "EmbeddingValidationError";
    this.parameterName = parameterName;
  }
}
