/**
 * Repository ingestion error classes.
 *
 * All errors carry a code for categorization and support cause chaining.
 *
 * @module ingestion/errors
 */

/**
 * Base error class for ingestion pipeline failures.
 */
export class IngestionError extends Error {
  public readonly code: string;
  public override readonly cause?: Error;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string = "INGESTION_ERROR",
    cause?: Error,
    retryable: boolean = false
  ) {
    super(message);
    this.name = "IngestionError";
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
 * Error thrown when caller input is malformed.
 *
 * Raised for repository URLs that are not `http(s)://github.com/{owner}/{repo}`.
 * Never retried; the HTTP layer maps it to 400.
 */
export class InvalidInputError extends IngestionError {
  public readonly field: string;

  constructor(message: string, field: string, cause?: Error) {
    super(message, "INVALID_INPUT", cause);
    this.name = "InvalidInputError";
    this.field = field;
  }
}

/**
 * Error thrown when the repository itself cannot be read from the source host.
 *
 * Covers repository-not-found, authentication and transport failures of the
 * repository lookup or root listing. Failures of individual files never
 * surface as this error.
 */
export class SourceFetchError extends IngestionError {
  public readonly owner: string;
  public readonly repo: string;
  public readonly branch: string;

  constructor(
    message: string,
    location: { owner: string; repo: string; branch: string },
    cause?: Error,
    retryable: boolean = false
  ) {
    super(message, "SOURCE_FETCH_ERROR", cause, retryable);
    this.name = "SourceFetchError";
    this.owner = location.owner;
    this.repo = location.repo;
    this.branch = location.branch;
  }
}

/**
 * Error thrown when a document cannot be split into chunks.
 */
export class ChunkingError extends IngestionError {
  public readonly documentId: string;

  constructor(message: string, documentId: string, cause?: Error) {
    super(message, "CHUNKING_ERROR", cause);
    this.name = "ChunkingError";
    this.documentId = documentId;
  }
}
