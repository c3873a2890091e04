/**
 * GitHub API Client Implementation
 *
 * Reads repositories through GitHub's REST contents API: repository lookup,
 * directory listings and base64-encoded file blobs. Handles authentication,
 * rate limits, timeouts and retries of transient failures.
 */

import type { Logger } from "pino";
import type { ZodError, ZodType, ZodTypeDef } from "zod";

import { getComponentLogger } from "../logging/index.js";
import { withRetry } from "../utils/index.js";

import type {
  ContentEntry,
  FileContent,
  GitHubClient,
  GitHubClientConfig,
  RepositoryInfo,
} from "./github-client-types.js";
import {
  GitHubAPIError,
  GitHubAuthenticationError,
  GitHubClientError,
  GitHubNetworkError,
  GitHubNotFoundError,
  GitHubRateLimitError,
  GitHubValidationError,
  type GitHubRequestTarget,
} from "./github-client-errors.js";
import {
  ContentRequestSchema,
  DirectoryListingResponseSchema,
  FileContentResponseSchema,
  GitHubClientConfigSchema,
  OwnerRepoSchema,
  RepositoryResponseSchema,
  type ValidatedContentRequest,
  type ValidatedGitHubClientConfig,
  type ValidatedOwnerRepo,
} from "./github-client-validation.js";

const USER_AGENT = "repo-vector-ingest/1.0";

interface RateLimitInfo {
  remaining: number;
  limit: number;
  resetAt: string;
}

interface FetchResult<T> {
  data: T;
  statusCode: number;
  rateLimit?: RateLimitInfo;
}

/**
 * Implementation of GitHubClient over the REST API
 */
export class GitHubClientImpl implements GitHubClient {
  private readonly config: ValidatedGitHubClientConfig;
  private _logger: Logger | null = null;

  constructor(config: GitHubClientConfig = {}) {
    this.config = parseOrThrow(
      GitHubClientConfigSchema,
      config,
      "Invalid GitHub client configuration"
    );
  }

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("services:github-client");
    }
    return this._logger;
  }

  async getRepository(owner: string, repo: string): Promise<RepositoryInfo> {
    const validated: ValidatedOwnerRepo = parseOrThrow(
      OwnerRepoSchema,
      { owner, repo },
      "Invalid getRepository parameters"
    );
    const url = `${this.config.baseUrl}/repos/${validated.owner}/${validated.repo}`;
    const startTime = Date.now();

    const { data, statusCode, rateLimit } = await this.fetchWithRetry(
      url,
      validated,
      RepositoryResponseSchema
    );

    this.logger.debug(
      {
        operation: "github_get_repository",
        owner: validated.owner,
        repo: validated.repo,
        statusCode,
        rateLimit,
        durationMs: Date.now() - startTime,
      },
      "Retrieved repository"
    );

    return {
      fullName: data.full_name,
      defaultBranch: data.default_branch,
      isPrivate: data.private,
    };
  }

  async listDirectory(
    owner: string,
    repo: string,
    path: string,
    ref: string
  ): Promise<ContentEntry[]> {
    const validated = this.validateContentRequest(owner, repo, path, ref);
    const { data, statusCode } = await this.fetchWithRetry(
      this.contentsUrl(validated),
      validated,
      DirectoryListingResponseSchema
    );

    this.logger.debug(
      {
        operation: "github_list_directory",
        owner: validated.owner,
        repo: validated.repo,
        path: validated.path,
        ref: validated.ref,
        entries: data.length,
        statusCode,
      },
      "Listed directory"
    );

    return data.map((entry) => ({
      type: entry.type,
      name: entry.name,
      path: entry.path,
      sha: entry.sha,
      size: entry.size,
    }));
  }

  async getFileContent(
    owner: string,
    repo: string,
    path: string,
    ref: string
  ): Promise<FileContent> {
    const validated = this.validateContentRequest(owner, repo, path, ref);
    const { data } = await this.fetchWithRetry(
      this.contentsUrl(validated),
      validated,
      FileContentResponseSchema
    );

    return {
      path: data.path,
      sha: data.sha,
      size: data.size,
      encoding: data.encoding,
      content: data.content,
    };
  }

  /**
   * Check if the GitHub API is accessible and authenticated
   *
   * `/rate_limit` does not count against the caller's quota.
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.doFetch(`${this.config.baseUrl}/rate_limit`);
      return true;
    } catch (error) {
      this.logger.warn(
        { error: error instanceof Error ? error.message : String(error) },
        "GitHub API health check failed"
      );
      return false;
    }
  }

  private validateContentRequest(
    owner: string,
    repo: string,
    path: string,
    ref: string
  ): ValidatedContentRequest {
    return parseOrThrow(
      ContentRequestSchema,
      { owner, repo, path, ref },
      "Invalid contents request parameters"
    );
  }

  private contentsUrl(request: ValidatedContentRequest): string {
    const encodedPath = request.path
      .split("/")
      .filter((segment) => segment.length > 0)
      .map((segment) => encodeURIComponent(segment))
      .join("/");
    const suffix = encodedPath ? `/${encodedPath}` : "";
    return `${this.config.baseUrl}/repos/${request.owner}/${request.repo}/contents${suffix}?ref=${encodeURIComponent(request.ref)}`;
  }

  /**
   * Perform HTTP fetch with retry logic and validate the body against `schema`
   */
  private async fetchWithRetry<T>(
    url: string,
    target: GitHubRequestTarget,
    schema: ZodType<T, ZodTypeDef, unknown>
  ): Promise<FetchResult<T>> {
    return withRetry(
      async () => {
        const response = await this.doFetch(url, target);
        return {
          data: await this.parseBody(response, url, target, schema),
          statusCode: response.status,
          rateLimit: this.extractRateLimitInfo(response),
        };
      },
      {
        maxRetries: this.config.maxRetries,
        shouldRetry: (error) => error instanceof GitHubClientError && error.retryable,
        calculateBackoff: (attempt, error) => {
          const resetDelay =
            error instanceof GitHubRateLimitError ? error.retryDelayMs() : undefined;
          return resetDelay ?? Math.pow(2, attempt) * 1000;
        },
        onRetry: (attempt, error, delayMs) => {
          this.logger.warn(
            {
              attempt: attempt + 1,
              maxRetries: this.config.maxRetries,
              delayMs,
              url: this.sanitizeUrl(url),
              error: error.message,
            },
            "Retrying GitHub API request"
          );
        },
      }
    );
  }

  /**
   * Perform a single HTTP GET, mapping failures onto the error taxonomy
   */
  private async doFetch(url: string, target?: GitHubRequestTarget): Promise<Response> {
    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
      "X-GitHub-Api-Version": "2022-11-28",
      "User-Agent": USER_AGENT,
    };

    if (this.config.token) {
      headers["Authorization"] = `Bearer ${this.config.token}`;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await fetch(url, {
        method: "GET",
        headers,
        signal: controller.signal,
      });

      if (!response.ok) {
        await this.handleErrorResponse(response, url, target);
      }

      return response;
    } catch (error) {
      if (error instanceof GitHubClientError) {
        throw error;
      }

      if (error instanceof Error) {
        if (error.name === "AbortError") {
          throw new GitHubNetworkError(`Request timeout after ${this.config.timeoutMs}ms`, {
            target,
            cause: error,
          });
        }
        throw new GitHubNetworkError(`Network error: ${this.sanitizeErrorMessage(error.message)}`, {
          target,
          cause: error,
        });
      }

      throw new GitHubNetworkError(`Unexpected error: ${String(error)}`, { target, cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async parseBody<T>(
    response: Response,
    url: string,
    target: GitHubRequestTarget,
    schema: ZodType<T, ZodTypeDef, unknown>
  ): Promise<T> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new GitHubAPIError(
        `Invalid JSON response from ${this.sanitizeUrl(url)}`,
        response.status,
        { target, cause: error }
      );
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new GitHubAPIError(
        `Unexpected response shape from ${this.sanitizeUrl(url)}: ${formatIssues(parsed.error).join("; ")}`,
        response.status,
        { target }
      );
    }
    return parsed.data;
  }

  private extractRateLimitInfo(response: Response): RateLimitInfo | undefined {
    const remaining = response.headers.get("x-ratelimit-remaining");
    const limit = response.headers.get("x-ratelimit-limit");
    const reset = response.headers.get("x-ratelimit-reset");

    if (remaining && limit && reset) {
      return {
        remaining: parseInt(remaining, 10),
        limit: parseInt(limit, 10),
        resetAt: new Date(parseInt(reset, 10) * 1000).toISOString(),
      };
    }

    return undefined;
  }

  /**
   * Map a non-2xx response onto the error taxonomy
   */
  private async handleErrorResponse(
    response: Response,
    url: string,
    target?: GitHubRequestTarget
  ): Promise<never> {
    const status = response.status;
    const errorMessage = await readErrorMessage(response, response.statusText);

    switch (status) {
      case 401:
        throw new GitHubAuthenticationError(
          "GitHub authentication failed. Check your GITHUB_PAT token.",
          { target }
        );
      case 403:
      case 429: {
        const rateLimitRemaining = response.headers.get("x-ratelimit-remaining");
        const rateLimitReset = response.headers.get("x-ratelimit-reset");

        if (
          status === 429 ||
          rateLimitRemaining === "0" ||
          errorMessage.toLowerCase().includes("rate limit")
        ) {
          const resetAt = rateLimitReset
            ? new Date(parseInt(rateLimitReset, 10) * 1000)
            : undefined;
          throw new GitHubRateLimitError(
            `GitHub API rate limit exceeded. Reset at ${resetAt?.toISOString() ?? "unknown"}.`,
            resetAt,
            { target }
          );
        }

        throw new GitHubAuthenticationError(
          `Access denied to ${this.sanitizeUrl(url)}. Check repository permissions.`,
          { target }
        );
      }
      case 404:
        if (target) {
          throw new GitHubNotFoundError(target);
        }
        throw new GitHubAPIError(`Resource not found: ${this.sanitizeUrl(url)}`, status);
      case 422:
        throw new GitHubValidationError(`Validation failed: ${errorMessage}`, [], { target });
      default:
        throw new GitHubAPIError(`GitHub API error: ${errorMessage}`, status, { target });
    }
  }

  private sanitizeUrl(url: string): string {
    return url.replace(/access_token=[^&]+/gi, "access_token=[REDACTED]");
  }

  /**
   * Strip GitHub token patterns (ghp_, gho_, ghu_, ghs_, ghr_, github_pat_)
   * and bearer credentials from a message
   */
  private sanitizeErrorMessage(message: string): string {
    return message
      .replace(/gh[pousr]_[A-Za-z0-9]{36,}/g, "[REDACTED]")
      .replace(/github_pat_[A-Za-z0-9_]{22,}/g, "[REDACTED]")
      .replace(/Bearer [A-Za-z0-9_.-]+/gi, "Bearer [REDACTED]");
  }
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
}

function parseOrThrow<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  input: unknown,
  message: string
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new GitHubValidationError(message, formatIssues(result.error));
  }
  return result.data;
}

async function readErrorMessage(response: Response, fallback: string): Promise<string> {
  try {
    const body: unknown = await response.json();
    if (typeof body === "object" && body !== null && "message" in body) {
      const message = body.message;
      if (typeof message === "string" && message.length > 0) {
        return message;
      }
    }
    return fallback;
  } catch {
    return fallback;
  }
}
