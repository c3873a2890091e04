/**
 * Vector storage module exports
 *
 * @module storage
 */

export {
  ChromaStorageClientImpl,
  createChromaApi,
  convertDistanceToSimilarity,
} from "./chroma-client.js";
export type {
  StorageConfig,
  RecordMetadataValue,
  StoredMetadata,
  VectorRecord,
  VectorQuery,
  VectorSearchResult,
  VectorStorageClient,
  ChromaApi,
  ChromaApiFactory,
  ChromaCollectionHandle,
  ChromaQueryResult,
} from "./types.js";
export {
  StorageError,
  StorageConnectionError,
  InvalidParametersError,
  DocumentOperationError,
  SearchOperationError,
} from "./errors.js";
