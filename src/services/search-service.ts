/**
 * SearchService implementation for semantic search
 *
 * Embeds the query and ranks stored chunks by cosine similarity, optionally
 * scoped to one repository's namespace.
 */

import type { Logger } from "pino";
import type { EmbeddingProvider } from "../providers/index.js";
import type { VectorStorageClient } from "../storage/index.js";
import { buildNamespace } from "../ingestion/index.js";
import { parseGitHubRepositoryUrl } from "../utils/index.js";
import { getComponentLogger } from "../logging/index.js";
import type { SearchQuery, SearchResponse, SearchService } from "./types.js";
import { SearchQuerySchema, type ValidatedSearchQuery } from "./validation.js";
import { SearchValidationError } from "./errors.js";

/**
 * SearchService backed by the vector store
 */
export class SearchServiceImpl implements SearchService {
  private _logger: Logger | null = null;

  constructor(
    private readonly embeddingProvider: EmbeddingProvider,
    private readonly storageClient: VectorStorageClient
  ) {}

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("services:search");
    }
    return this._logger;
  }

  async search(query: SearchQuery): Promise<SearchResponse> {
    const startTime = performance.now();
    const validated = this.validateQuery(query);
    const namespace = this.resolveNamespace(validated);

    const embeddingStart = performance.now();
    const embedding = await this.embeddingProvider.generateEmbedding(validated.query);
    const embeddingTime = performance.now() - embeddingStart;

    const rawResults = await this.storageClient.query({
      embedding,
      namespace: namespace ?? undefined,
      limit: validated.limit,
    });

    const results = rawResults.map((result) => ({
      id: result.id,
      text: result.content,
      metadata: result.metadata,
      score: result.similarity,
    }));

    const durationMs = Math.round(performance.now() - startTime);

    this.logger.info(
      {
        namespace,
        queryLength: validated.query.length,
        totalResults: results.length,
        embeddingTimeMs: Math.round(embeddingTime),
        durationMs,
      },
      "Search completed"
    );

    return { results, namespace, totalResults: results.length, durationMs };
  }

  /**
   * @throws {SearchValidationError}
   */
  private validateQuery(query: SearchQuery): ValidatedSearchQuery {
    const result = SearchQuerySchema.safeParse(query);
    if (!result.success) {
      const errors = result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      );
      throw new SearchValidationError(`Invalid search query: ${errors.join("; ")}`, errors);
    }
    return result.data;
  }

  private resolveNamespace(query: ValidatedSearchQuery): string | null {
    if (query.namespace) {
      return query.namespace;
    }
    if (query.repoUrl) {
      const { owner, repo } = parseGitHubRepositoryUrl(query.repoUrl);
      return buildNamespace(owner, repo);
    }
    return null;
  }
}
