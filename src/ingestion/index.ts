/**
 * Repository ingestion module.
 *
 * URL-independent pieces of the pipeline: file filtering, content fetching,
 * normalization, namespacing and chunking.
 *
 * @module ingestion
 */

export { FileFilter, getFileExtension } from "./file-filter.js";
export {
  COMMON_EXTENSIONS,
  IGNORED_DIRECTORIES,
  LANGUAGE_EXTENSIONS,
  SUPPORTED_LANGUAGES,
} from "./file-policy.js";
export { GitHubContentFetcher, decodeBase64Content } from "./content-fetcher.js";
export type { ContentSource, ContentFetcherOptions } from "./content-fetcher.js";
export { buildDocumentMetadata, normalizeDocuments } from "./document-normalizer.js";
export { buildNamespace } from "./namespace.js";
export { DocumentChunker, estimateTokens, createChunkId } from "./document-chunker.js";
export type {
  RepositoryRef,
  MetadataValue,
  DocumentMetadata,
  Document,
  NormalizationContext,
  ContentFetchStats,
  ChunkerConfig,
  DocumentChunk,
} from "./types.js";
export {
  IngestionError,
  InvalidInputError,
  SourceFetchError,
  ChunkingError,
} from "./errors.js";
