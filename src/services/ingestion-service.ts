/**
 * IngestionService - Orchestrates repository ingestion
 *
 * Resolves the repository URL, fetches matching files from GitHub,
 * normalizes them into documents and hands them to the indexer.
 *
 * @module services/ingestion-service
 */

import type { Logger } from "pino";
import {
  FileFilter,
  buildNamespace,
  normalizeDocuments,
  type GitHubContentFetcher,
} from "../ingestion/index.js";
import { parseGitHubRepositoryUrl } from "../utils/index.js";
import { StorageError } from "../storage/index.js";
import { getComponentLogger } from "../logging/index.js";
import type { DocumentIndexer } from "./document-indexer.js";
import type { IngestionRequest, IngestionResult } from "./ingestion-types.js";

/**
 * Fetches a repository's documents
 */
export type DocumentFetcher = Pick<GitHubContentFetcher, "fetchDocuments">;

/**
 * Embeds and stores documents under a namespace
 */
export type IndexingCollaborator = Pick<DocumentIndexer, "index">;

/**
 * Service for ingesting one repository at a time
 *
 * Holds no per-run state, so one instance serves concurrent runs.
 *
 * @example
 * ```typescript
 * const service = new IngestionService(contentFetcher, documentIndexer);
 * const result = await service.ingest({
 *   repoUrl: "https://github.com/acme/widgets",
 *   branch: "main",
 *   metadata: { team: "platform" },
 * });
 * ```
 */
export class IngestionService {
  private _logger: Logger | null = null;

  constructor(
    private readonly fetcher: DocumentFetcher,
    private readonly indexer: IndexingCollaborator
  ) {}

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("services:ingestion");
    }
    return this._logger;
  }

  /**
   * Ingest a repository.
   *
   * An empty or fully filtered repository completes with status "empty"
   * and never reaches the indexer.
   *
   * @throws {InvalidInputError} If the URL is not a GitHub repository URL
   * @throws {SourceFetchError} If the repository cannot be read
   * @throws {StorageError} If embedding or storage fails
   */
  async ingest(request: IngestionRequest): Promise<IngestionResult> {
    const startTime = Date.now();
    const { owner, repo } = parseGitHubRepositoryUrl(request.repoUrl);
    const namespace = buildNamespace(owner, repo);
    const { branch } = request;

    this.logger.info(
      { owner, repo, branch, namespace, language: request.language },
      "Starting repository ingestion"
    );

    const fetched = await this.fetcher.fetchDocuments(
      owner,
      repo,
      branch,
      new FileFilter(request.language)
    );

    if (fetched.length === 0) {
      this.logger.warn(
        { owner, repo, branch, namespace },
        "No documents matched, nothing to index"
      );
      return {
        owner,
        repo,
        branch,
        namespace,
        status: "empty",
        documentsFetched: 0,
        chunksStored: 0,
        durationMs: Date.now() - startTime,
      };
    }

    const documents = normalizeDocuments(fetched, {
      owner,
      repo,
      branch,
      namespace,
      extraMetadata: request.metadata,
    });

    let chunksStored: number;
    try {
      ({ chunks: chunksStored } = await this.indexer.index(namespace, documents));
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new StorageError(
        `Failed to index ${owner}/${repo}: ${cause.message}`,
        "INDEXING_FAILED",
        cause
      );
    }

    const result: IngestionResult = {
      owner,
      repo,
      branch,
      namespace,
      status: "indexed",
      documentsFetched: documents.length,
      chunksStored,
      durationMs: Date.now() - startTime,
    };

    this.logger.info({ ...result }, "Repository ingestion complete");

    return result;
  }
}
