/**
 * Type definitions for the repository ingestion pipeline.
 *
 * @module ingestion/types
 */

/**
 * Repository identity parsed from a URL.
 */
export interface RepositoryRef {
  owner: string;
  repo: string;
}

/**
 * Scalar value allowed in document metadata.
 */
export type MetadataValue = string | number | boolean | null;

/**
 * Document metadata mapping.
 */
export type DocumentMetadata = Record<string, MetadataValue>;

/**
 * Normalized unit of ingestible content.
 *
 * `text` is never empty or whitespace-only: such content is dropped at fetch
 * time and never materialized as a Document.
 */
export interface Document {
  /** File content */
  text: string;

  /** Provenance metadata (owner, repo, branch, namespace, caller fields) */
  metadata: DocumentMetadata;

  /** Content-addressed identifier (source host blob sha) */
  id?: string;

  /** Embedding vector, when computed */
  embedding?: number[];

  /** Repository-relative file path */
  path?: string;
}

/**
 * Context applied to fetched documents by the normalizer.
 */
export interface NormalizationContext {
  owner: string;
  repo: string;
  branch: string;
  namespace: string;
  extraMetadata?: DocumentMetadata;
}

/**
 * Counters reported by a content fetch.
 */
export interface ContentFetchStats {
  /** Directories listed, including the root */
  directoriesListed: number;

  /** Directory listings that failed and were skipped */
  directoriesFailed: number;

  /** File entries seen in listings */
  candidateFiles: number;

  /** Files accepted by the file filter */
  acceptedFiles: number;

  /** Files turned into documents */
  documentsFetched: number;

  /** Files skipped because their text was empty or whitespace-only */
  emptyFiles: number;

  /** Files skipped because fetching or decoding failed */
  failedFiles: number;
}

/**
 * Configuration for the document chunker.
 */
export interface ChunkerConfig {
  /**
   * Maximum estimated tokens per chunk
   * @default 500
   */
  maxChunkTokens?: number;

  /**
   * Estimated tokens repeated from the end of the previous chunk
   * @default 50
   */
  overlapTokens?: number;
}

/**
 * Portion of a document sized for embedding.
 */
export interface DocumentChunk {
  /** Unique chunk ID: {namespace}:{documentId}:{chunkIndex} */
  id: string;

  /** Chunk text */
  text: string;

  /** Document metadata plus chunk position fields */
  metadata: DocumentMetadata;

  /** Zero-based chunk index */
  chunkIndex: number;

  /** Total chunks produced for the document */
  totalChunks: number;

  /** First line of the chunk (1-based) */
  startLine: number;

  /** Last line of the chunk (1-based, inclusive) */
  endLine: number;
}
