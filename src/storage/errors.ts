/**
 * Error classes for vector storage operations
 */

/**
 * Base error class for storage and indexing failures
 *
 * The ingestion pipeline wraps every embed/store failure in this class
 * (code `INDEXING_FAILED` when the underlying error is not already a
 * StorageError).
 */
export class StorageError extends Error {
  public readonly code: string;

  /**
   * Restricted to Error instances, unlike the built-in `unknown`
   */
  public override readonly cause?: Error;

  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string = "STORAGE_ERROR",
    cause?: Error,
    retryable: boolean = false
  ) {
    super(message);
    this.name = "StorageError";
    this.code = code;
    this.cause = cause;
    this.retryable = retryable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    if (cause && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * ChromaDB unreachable, or an operation attempted before `connect()`
 *
 * @example
 * ```typescript
 * try {
 *   await storage.connect();
 * } catch (error) {
 *   if (error instanceof StorageConnectionError) {
 *     logger.fatal({ err: error }, "ChromaDB is not available");
 *   }
 * }
 * ```
 */
export class StorageConnectionError extends StorageError {
  constructor(message: string, cause?: Error, retryable: boolean = true) {
    super(message, "CONNECTION_ERROR", cause, retryable);
    this.name = "StorageConnectionError";
  }
}

/**
 * Malformed records or query parameters
 */
export class InvalidParametersError extends StorageError {
  public readonly parameterName?: string;

  constructor(message: string, parameterName?: string) {
    super(message, "INVALID_PARAMETERS");
    this.name = "InvalidParametersError";
    this.parameterName = parameterName;
  }
}

/**
 * A write to the collection failed
 */
export class DocumentOperationError extends StorageError {
  public readonly operation: "upsert";

  /** Record ids in the failed batch */
  public readonly documentIds?: string[];

  constructor(
    operation: "upsert",
    message: string,
    documentIds?: string[],
    cause?: Error,
    retryable: boolean = false
  ) {
    super(message, "DOCUMENT_OPERATION_ERROR", cause, retryable);
    this.name = "DocumentOperationError";
    this.operation = operation;
    this.documentIds = documentIds;
  }
}

/**
 * A similarity query failed
 */
export class SearchOperationError extends StorageError {
  /** Namespace filter of the failed query, if any */
  public readonly namespace?: string;

  constructor(message: string, namespace?: string, cause?: Error, retryable: boolean = false) {
    super(message, "SEARCH_OPERATION_ERROR", cause, retryable);
    this.name = "SearchOperationError";
    this.namespace = namespace;
  }
}
