/**
 * Error classes for the GitHub contents client
 *
 * Errors record which repository location the failed request was about, so
 * a failure while reading one file can be reported against that file.
 */

/**
 * Repository location a request was made for
 */
export interface GitHubRequestTarget {
  owner: string;
  repo: string;
  /** Repository-relative path; absent for repository lookups */
  path?: string;
  /** Branch, tag or commit; absent for repository lookups */
  ref?: string;
}

/**
 * "owner/repo", "owner/repo@ref" or "owner/repo:path@ref"
 */
export function describeTarget(target: GitHubRequestTarget): string {
  const path = target.path ? `:${target.path}` : "";
  const ref = target.ref ? `@${target.ref}` : "";
  return `${target.owner}/${target.repo}${path}${ref}`;
}

export type GitHubErrorCode =
  | "GITHUB_AUTH_ERROR"
  | "GITHUB_RATE_LIMIT"
  | "GITHUB_NOT_FOUND"
  | "GITHUB_NETWORK_ERROR"
  | "GITHUB_API_ERROR"
  | "GITHUB_VALIDATION_ERROR";

interface GitHubErrorOptions {
  target?: GitHubRequestTarget;
  cause?: unknown;
}

/**
 * Base class for all GitHub client errors
 *
 * `retryable` is what the client's retry loop and the content fetcher read.
 */
export abstract class GitHubClientError extends Error {
  public abstract readonly code: GitHubErrorCode;
  public readonly retryable: boolean;
  public readonly target?: GitHubRequestTarget;
  public override readonly cause?: unknown;

  constructor(message: string, retryable: boolean, options: GitHubErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.retryable = retryable;
    this.target = options.target;
    this.cause = options.cause;
  }

  /**
   * Structured fields for log entries about this failure
   */
  toLogFields(): Record<string, string | number | boolean | undefined> {
    return {
      code: this.code,
      retryable: this.retryable,
      owner: this.target?.owner,
      repo: this.target?.repo,
      path: this.target?.path,
      ref: this.target?.ref,
    };
  }
}

/**
 * 401, or 403 without rate limit exhaustion
 */
export class GitHubAuthenticationError extends GitHubClientError {
  public readonly code = "GITHUB_AUTH_ERROR" as const;

  constructor(message: string, options?: GitHubErrorOptions) {
    super(message, false, options);
  }
}

/**
 * 429, or 403 with the rate limit exhausted
 */
export class GitHubRateLimitError extends GitHubClientError {
  public readonly code = "GITHUB_RATE_LIMIT" as const;
  /** From `x-ratelimit-reset`, when the response carried it */
  public readonly resetAt?: Date;

  constructor(message: string, resetAt?: Date, options?: GitHubErrorOptions) {
    super(message, true, options);
    this.resetAt = resetAt;
  }

  /**
   * Milliseconds until the limit resets, or undefined when unknown
   */
  retryDelayMs(now: number = Date.now()): number | undefined {
    return this.resetAt ? Math.max(this.resetAt.getTime() - now, 0) : undefined;
  }
}

/**
 * The repository, ref or path does not exist or is not visible to the token
 */
export class GitHubNotFoundError extends GitHubClientError {
  public readonly code = "GITHUB_NOT_FOUND" as const;
  public override readonly target: GitHubRequestTarget;

  constructor(target: GitHubRequestTarget, options: Omit<GitHubErrorOptions, "target"> = {}) {
    super(`Not found on GitHub: ${describeTarget(target)}`, false, { ...options, target });
    this.target = target;
  }
}

/**
 * Timeouts and connection failures
 */
export class GitHubNetworkError extends GitHubClientError {
  public readonly code = "GITHUB_NETWORK_ERROR" as const;

  constructor(message: string, options?: GitHubErrorOptions) {
    super(message, true, options);
  }
}

/**
 * Statuses GitHub answers transiently
 */
const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504]);

export function isRetryableStatusCode(statusCode: number): boolean {
  return RETRYABLE_STATUS_CODES.has(statusCode);
}

/**
 * Any other non-2xx response, or a 2xx body of an unexpected shape
 * (a directory where a file was expected, for instance)
 */
export class GitHubAPIError extends GitHubClientError {
  public readonly code = "GITHUB_API_ERROR" as const;
  public readonly statusCode: number;

  constructor(message: string, statusCode: number, options?: GitHubErrorOptions) {
    super(message, isRetryableStatusCode(statusCode), options);
    this.statusCode = statusCode;
  }
}

/**
 * Invalid client configuration or request parameters, or a 422 from GitHub
 */
export class GitHubValidationError extends GitHubClientError {
  public readonly code = "GITHUB_VALIDATION_ERROR" as const;
  public readonly validationErrors: string[];

  constructor(message: string, validationErrors: string[] = [], options?: GitHubErrorOptions) {
    super(message, false, options);
    this.validationErrors = validationErrors;
  }
}

export function isRetryableGitHubError(error: unknown): boolean {
  return error instanceof GitHubClientError && error.retryable;
}
