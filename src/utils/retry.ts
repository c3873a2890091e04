/**
 * Retry utility with exponential backoff
 *
 * Shared by the source-host client and the embedding provider for
 * transient failures. The ingestion pipeline itself does not retry.
 */

import type pino from "pino";

/**
 * Options for retry behavior
 */
export interface RetryOptions {
  /**
   * Maximum number of retry attempts (0 = no retries, just initial attempt)
   */
  maxRetries: number;

  /**
   * Whether an error should trigger another attempt
   * @default () => true
   */
  shouldRetry?: (error: Error) => boolean;

  /**
   * Delay before retry `attempt` (0-based)
   * @default defaultExponentialBackoff
   */
  calculateBackoff?: (attempt: number, error: Error) => number;

  /**
   * Invoked before each retry, typically for logging
   */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * Exponential backoff with base 2: 1s, 2s, 4s, 8s, ...
 *
 * @param attempt - Retry attempt number (0-based)
 */
export function defaultExponentialBackoff(attempt: number): number {
  return Math.pow(2, attempt) * 1000;
}

/**
 * Create a standardized onRetry callback that logs at warn level
 *
 * @example
 * ```typescript
 * const onRetry = createRetryLogger(logger, "GitHub API request", 3);
 * await withRetry(operation, { maxRetries: 3, onRetry });
 * ```
 */
export function createRetryLogger(
  logger: pino.Logger,
  operation: string,
  maxRetries: number
): (attempt: number, error: Error, delayMs: number) => void {
  return (attempt: number, error: Error, delayMs: number): void => {
    logger.warn(
      {
        attempt: attempt + 1,
        maxRetries,
        delayMs,
        error: error.message,
        errorType: error.constructor.name,
      },
      `Retrying ${operation}`
    );
  };
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Execute an async operation with automatic retry on failure
 *
 * @throws The last error encountered once retries are exhausted or
 *         `shouldRetry` declines
 *
 * @example
 * ```typescript
 * const result = await withRetry(() => makeRequest(), {
 *   maxRetries: 5,
 *   shouldRetry: (error) => error instanceof NetworkError,
 * });
 * ```
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const {
    maxRetries,
    shouldRetry = () => true,
    calculateBackoff = defaultExponentialBackoff,
    onRetry,
  } = options;

  let lastError: Error = new Error("Retry loop completed without success or error");

  // Attempt 0 is the initial try, attempts 1-N are retries
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = toError(error);

      if (attempt >= maxRetries || !shouldRetry(lastError)) {
        throw lastError;
      }

      const delayMs = calculateBackoff(attempt, lastError);
      onRetry?.(attempt, lastError, delayMs);
      await sleep(delayMs);
    }
  }

  throw lastError;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
