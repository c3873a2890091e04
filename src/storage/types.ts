/**
 * Type definitions for the vector storage client
 *
 * All repositories share one ChromaDB collection; each record carries its
 * namespace in metadata and queries filter on it.
 */

/**
 * Configuration for the ChromaDB storage client
 */
export interface StorageConfig {
  /** ChromaDB server URL, e.g. "http://localhost:8000" */
  url: string;
  /** Token sent with every request */
  authToken: string;
  /** Shared collection name (default "github") */
  collectionName: string;
  /** Maximum records per upsert call */
  upsertBatchSize: number;
}

/**
 * Metadata values accepted on write. Nulls are dropped before storage.
 */
export type RecordMetadataValue = string | number | boolean | null;

/**
 * Metadata values as stored and returned by ChromaDB
 */
export type StoredMetadata = Record<string, string | number | boolean>;

/**
 * Embedded chunk ready for upsert
 */
export interface VectorRecord {
  /** Stable record id; re-upserting the same id replaces the record */
  id: string;
  /** Embedding vector */
  embedding: number[];
  /** Chunk text */
  text: string;
  /** Provenance and chunk metadata */
  metadata: Record<string, RecordMetadataValue>;
}

/**
 * Nearest-neighbour query
 */
export interface VectorQuery {
  /** Query embedding */
  embedding: number[];
  /** Restrict results to one namespace; all namespaces when omitted */
  namespace?: string;
  /** Maximum results */
  limit: number;
}

/**
 * One ranked query result
 */
export interface VectorSearchResult {
  id: string;
  content: string;
  metadata: StoredMetadata;
  /** Raw cosine distance (0 = identical, 2 = opposite) */
  distance: number;
  /** 1 - distance / 2, clamped to [0, 1] */
  similarity: number;
}

/**
 * Vector storage operations used by the indexer and search service
 *
 * @example
 * ```typescript
 * const storage: VectorStorageClient = new ChromaStorageClientImpl(config.storage);
 * await storage.connect();
 * await storage.upsertRecords("github_acme_widgets", records);
 * const hits = await storage.query({ embedding, namespace: "github_acme_widgets", limit: 5 });
 * ```
 */
export interface VectorStorageClient {
  /**
   * Create the client, verify the server and provision the collection
   *
   * @throws {StorageConnectionError} If the server is unreachable
   */
  connect(): Promise<void>;

  /**
   * Whether the server answers a heartbeat. Never throws.
   */
  healthCheck(): Promise<boolean>;

  /**
   * Insert or replace records under a namespace
   *
   * @throws {InvalidParametersError} If a record is malformed
   * @throws {DocumentOperationError} If the upsert fails
   */
  upsertRecords(namespace: string, records: VectorRecord[]): Promise<void>;

  /**
   * Rank stored records by similarity to an embedding
   *
   * @throws {InvalidParametersError} If the query is malformed
   * @throws {SearchOperationError} If the query fails
   */
  query(query: VectorQuery): Promise<VectorSearchResult[]>;
}

/**
 * Query result columns as returned by ChromaDB (one row per query embedding)
 */
export interface ChromaQueryResult {
  ids: string[][];
  distances?: (number | null)[][] | null;
  documents?: (string | null)[][] | null;
  metadatas?: (Record<string, unknown> | null)[][] | null;
}

/**
 * Collection operations the storage client calls
 */
export interface ChromaCollectionHandle {
  upsert(params: {
    ids: string[];
    embeddings: number[][];
    metadatas: StoredMetadata[];
    documents: string[];
  }): Promise<void>;
  query(params: {
    queryEmbeddings: number[][];
    nResults: number;
    where?: Record<string, string>;
  }): Promise<ChromaQueryResult>;
}

/**
 * Server operations the storage client calls
 */
export interface ChromaApi {
  heartbeat(): Promise<number>;
  getOrCreateCollection(params: {
    name: string;
    metadata: Record<string, string>;
  }): Promise<ChromaCollectionHandle>;
}

/**
 * Builds the ChromaDB API binding for a configuration
 */
export type ChromaApiFactory = (config: StorageConfig) => ChromaApi;
