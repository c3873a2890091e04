/**
 * Type definitions for SearchService
 */

import type { StoredMetadata } from "../storage/index.js";

/**
 * Search input, validated by SearchQuerySchema
 */
export interface SearchQuery {
  /** Natural-language or code query */
  query: string;
  /** Maximum results (1-50, default 5) */
  limit?: number;
  /** Restrict to one namespace */
  namespace?: string;
  /** Restrict to the namespace of a GitHub repository URL */
  repoUrl?: string;
}

/**
 * One search hit
 */
export interface SearchResult {
  /** Chunk id */
  id: string;
  /** Chunk text */
  text: string;
  /** Stored chunk metadata */
  metadata: StoredMetadata;
  /** Similarity in [0, 1], higher is closer */
  score: number;
}

export interface SearchResponse {
  results: SearchResult[];
  /** Namespace searched, or null when every namespace was searched */
  namespace: string | null;
  totalResults: number;
  durationMs: number;
}

/**
 * Semantic search over ingested repositories
 */
export interface SearchService {
  /**
   * @throws {SearchValidationError} If the query is invalid
   * @throws {InvalidInputError} If `repoUrl` is not a GitHub repository URL
   * @throws {EmbeddingError} If the query cannot be embedded
   * @throws {StorageError} If the vector query fails
   */
  search(query: SearchQuery): Promise<SearchResponse>;
}
