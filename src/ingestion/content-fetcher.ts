/**
 * Repository content fetcher.
 *
 * Walks a repository tree through the source host's contents API and turns
 * every file accepted by a {@link FileFilter} into a {@link Document}.
 *
 * @module ingestion/content-fetcher
 */

import pLimit from "p-limit";
import type pino from "pino";
import { getComponentLogger } from "../logging/index.js";
import { toError } from "../utils/index.js";
import type { ContentEntry, GitHubClient } from "../services/github-client-types.js";
import { GitHubClientError, isRetryableGitHubError } from "../services/github-client-errors.js";
import { SourceFetchError } from "./errors.js";
import type { FileFilter } from "./file-filter.js";
import type { ContentFetchStats, Document } from "./types.js";

/**
 * Source host operations the fetcher needs.
 */
export type ContentSource = Pick<GitHubClient, "getRepository" | "listDirectory" | "getFileContent">;

/**
 * Options for {@link GitHubContentFetcher}.
 */
export interface ContentFetcherOptions {
  /**
   * Maximum in-flight source host requests per fetch
   * @default 10
   */
  concurrency?: number;
}

const DEFAULT_CONCURRENCY = 10;
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decode a base64 transport payload into UTF-8 text.
 *
 * Line breaks inside the payload are ignored (the contents API wraps base64
 * at 60 columns).
 *
 * @throws {Error} If the payload is not valid base64 or not valid UTF-8
 */
export function decodeBase64Content(content: string): string {
  const compact = content.replace(/\s+/g, "");
  if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new Error("Content is not valid base64");
  }

  const bytes = Buffer.from(compact, "base64");
  return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
}

/**
 * Fetches repository files as documents.
 *
 * Directory listings and file reads share one bounded pool, so at most
 * `concurrency` requests are in flight. Per-file failures are logged and
 * skipped; only a failed repository lookup or root listing aborts the fetch.
 *
 * @example
 * ```typescript
 * const fetcher = new GitHubContentFetcher(githubClient, { concurrency: 10 });
 * const documents = await fetcher.fetchDocuments("acme", "widgets", "main", new FileFilter());
 * ```
 */
export class GitHubContentFetcher {
  private readonly concurrency: number;
  private _logger: pino.Logger | null = null;

  constructor(
    private readonly source: ContentSource,
    options: ContentFetcherOptions = {}
  ) {
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Fetch concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
  }

  private get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("ingestion:content-fetcher");
    }
    return this._logger;
  }

  /**
   * Fetch every accepted file of `owner/repo` at `branch`.
   *
   * @returns Documents with `text`, `id` (blob sha), `path` and empty
   *          metadata, sorted by path
   * @throws {SourceFetchError} If the repository or its root cannot be read
   */
  async fetchDocuments(
    owner: string,
    repo: string,
    branch: string,
    filter: FileFilter
  ): Promise<Document[]> {
    const startTime = Date.now();
    const location = { owner, repo, branch };
    const limit = pLimit(this.concurrency);
    const stats: ContentFetchStats = {
      directoriesListed: 0,
      directoriesFailed: 0,
      candidateFiles: 0,
      acceptedFiles: 0,
      documentsFetched: 0,
      emptyFiles: 0,
      failedFiles: 0,
    };
    const documents: Document[] = [];

    try {
      await this.source.getRepository(owner, repo);
    } catch (error) {
      throw this.wrapSourceError(`Failed to access repository ${owner}/${repo}`, location, error);
    }

    let rootEntries: ContentEntry[];
    try {
      rootEntries = await limit(() => this.source.listDirectory(owner, repo, "", branch));
      stats.directoriesListed++;
    } catch (error) {
      throw this.wrapSourceError(
        `Failed to list ${owner}/${repo} at branch ${branch}`,
        location,
        error
      );
    }

    const visitDirectory = async (path: string): Promise<void> => {
      let entries: ContentEntry[];
      try {
        entries = await limit(() => this.source.listDirectory(owner, repo, path, branch));
        stats.directoriesListed++;
      } catch (error) {
        stats.directoriesFailed++;
        this.logger.warn(
          { owner, repo, branch, path, ...failureFields(error) },
          "Failed to list directory, skipping subtree"
        );
        return;
      }
      await visitEntries(entries);
    };

    const fetchFile = async (entry: ContentEntry): Promise<void> => {
      try {
        const file = await limit(() =>
          this.source.getFileContent(owner, repo, entry.path, branch)
        );
        if (file.encoding !== "base64") {
          throw new Error(`Unsupported content encoding "${file.encoding}"`);
        }

        const text = decodeBase64Content(file.content);
        if (text.trim().length === 0) {
          stats.emptyFiles++;
          this.logger.debug({ path: entry.path }, "Skipping empty file");
          return;
        }

        documents.push({ text, metadata: {}, id: file.sha, path: entry.path });
        stats.documentsFetched++;
      } catch (error) {
        stats.failedFiles++;
        this.logger.warn(
          { owner, repo, branch, path: entry.path, ...failureFields(error) },
          "Failed to fetch file, skipping"
        );
      }
    };

    const visitEntries = async (entries: ContentEntry[]): Promise<void> => {
      const tasks: Promise<void>[] = [];

      for (const entry of entries) {
        if (entry.type === "dir") {
          if (!filter.isIgnoredDirectory(entry.path)) {
            tasks.push(visitDirectory(entry.path));
          }
        } else if (entry.type === "file") {
          stats.candidateFiles++;
          if (filter.shouldFetch(entry.path)) {
            stats.acceptedFiles++;
            tasks.push(fetchFile(entry));
          }
        }
      }

      await Promise.all(tasks);
    };

    await visitEntries(rootEntries);

    documents.sort((a, b) => comparePaths(a.path ?? "", b.path ?? ""));

    this.logger.info(
      {
        owner,
        repo,
        branch,
        ...stats,
        durationMs: Date.now() - startTime,
      },
      "Repository content fetched"
    );

    return documents;
  }

  private wrapSourceError(
    message: string,
    location: { owner: string; repo: string; branch: string },
    error: unknown
  ): SourceFetchError {
    const cause = toError(error);
    return new SourceFetchError(
      `${message}: ${cause.message}`,
      location,
      cause,
      isRetryableGitHubError(error)
    );
  }
}

/**
 * Log fields for a skipped directory or file; client errors add their code
 * and the location of the request that failed
 */
function failureFields(error: unknown): Record<string, unknown> {
  if (error instanceof GitHubClientError) {
    return { ...error.toLogFields(), err: error };
  }
  return { err: toError(error) };
}

/**
 * Code-unit order, independent of locale
 */
function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
