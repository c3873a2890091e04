/**
 * ChromaDB Storage Client Implementation
 *
 * Stores every repository's chunks in one shared cosine collection,
 * partitioned by a `namespace` metadata field.
 *
 * @module storage/chroma-client
 */

import { ChromaClient } from "chromadb";
import type pino from "pino";
import type {
  ChromaApi,
  ChromaApiFactory,
  ChromaCollectionHandle,
  StorageConfig,
  StoredMetadata,
  VectorQuery,
  VectorRecord,
  VectorSearchResult,
  VectorStorageClient,
} from "./types.js";
import {
  StorageConnectionError,
  InvalidParametersError,
  DocumentOperationError,
  SearchOperationError,
} from "./errors.js";
import { getComponentLogger } from "../logging/index.js";

const COLLECTION_METADATA = { "hnsw:space": "cosine" };

/**
 * Bind the chromadb HTTP client with token authentication
 */
export const createChromaApi: ChromaApiFactory = (config) => {
  const client = new ChromaClient({
    path: config.url,
    auth: { provider: "token", credentials: config.authToken },
  });

  return {
    heartbeat: () => client.heartbeat(),
    async getOrCreateCollection({ name, metadata }) {
      const collection = await client.getOrCreateCollection({ name, metadata });
      return {
        async upsert(params) {
          await collection.upsert(params);
        },
        async query(params) {
          const result = await collection.query(params);
          return {
            ids: result.ids,
            distances: result.distances,
            documents: result.documents,
            metadatas: result.metadatas,
          };
        },
      };
    },
  };
};

/**
 * Convert cosine distance (0..2) to similarity (1..0), clamped to [0, 1]
 */
export function convertDistanceToSimilarity(distance: number): number {
  const similarity = 1 - distance / 2;
  return Math.max(0, Math.min(1, similarity));
}

/**
 * Keep primitive metadata values; nulls and anything else are dropped
 */
function toStoredMetadata(metadata: Record<string, unknown>): StoredMetadata {
  const stored: StoredMetadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      stored[key] = value;
    }
  }
  return stored;
}

/**
 * ChromaDB-backed vector storage
 *
 * @example
 * ```typescript
 * const storage = new ChromaStorageClientImpl({
 *   url: "http://localhost:8000",
 *   authToken: config.storage.authToken,
 *   collectionName: "github",
 *   upsertBatchSize: 100,
 * });
 * await storage.connect();
 * ```
 */
export class ChromaStorageClientImpl implements VectorStorageClient {
  private api: ChromaApi | null = null;
  private collection: ChromaCollectionHandle | null = null;
  private readonly config: StorageConfig;
  private readonly createApi: ChromaApiFactory;
  private _logger: pino.Logger | null = null;

  /**
   * @param config - Connection and collection settings
   * @param createApi - Binding factory (the chromadb client by default)
   */
  constructor(config: StorageConfig, createApi: ChromaApiFactory = createChromaApi) {
    if (!Number.isInteger(config.upsertBatchSize) || config.upsertBatchSize < 1) {
      throw new InvalidParametersError(
        "Upsert batch size must be a positive integer",
        "upsertBatchSize"
      );
    }
    this.config = config;
    this.createApi = createApi;
  }

  private get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("storage:chromadb");
    }
    return this._logger;
  }

  async connect(): Promise<void> {
    const startTime = Date.now();
    this.logger.info(
      { url: this.config.url, collection: this.config.collectionName },
      "Connecting to ChromaDB"
    );

    try {
      const api = this.createApi(this.config);
      await api.heartbeat();
      this.collection = await api.getOrCreateCollection({
        name: this.config.collectionName,
        metadata: COLLECTION_METADATA,
      });
      this.api = api;

      this.logger.info(
        {
          metric: "chromadb.connection_ms",
          value: Date.now() - startTime,
          collection: this.config.collectionName,
        },
        "Connected to ChromaDB"
      );
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error(
        {
          metric: "chromadb.connection_ms",
          value: Date.now() - startTime,
          url: this.config.url,
          err: error,
        },
        "Failed to connect to ChromaDB"
      );
      throw new StorageConnectionError(
        `Failed to connect to ChromaDB at ${this.config.url}: ${errorMessage}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  async healthCheck(): Promise<boolean> {
    if (!this.api) {
      this.logger.warn("Health check failed: Client not connected");
      return false;
    }

    try {
      await this.api.heartbeat();
      return true;
    } catch (error) {
      this.logger.warn({ err: error }, "ChromaDB health check failed");
      return false;
    }
  }

  /**
   * Upsert records in batches of `upsertBatchSize`
   *
   * `metadata.namespace` is always set to `namespace`, overriding any
   * value carried by the record.
   */
  async upsertRecords(namespace: string, records: VectorRecord[]): Promise<void> {
    const collection = this.requireCollection();

    if (namespace.trim().length === 0) {
      throw new InvalidParametersError("Namespace cannot be empty", "namespace");
    }
    if (records.length === 0) {
      return;
    }
    this.validateRecords(records);

    const startTime = Date.now();
    const batchSize = this.config.upsertBatchSize;

    for (let start = 0; start < records.length; start += batchSize) {
      const batch = records.slice(start, start + batchSize);
      const ids = batch.map((record) => record.id);

      try {
        await collection.upsert({
          ids,
          embeddings: batch.map((record) => record.embedding),
          metadatas: batch.map((record) => ({
            ...toStoredMetadata(record.metadata),
            namespace,
          })),
          documents: batch.map((record) => record.text),
        });
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        this.logger.error(
          { namespace, batchStart: start, batchSize: batch.length, err: error },
          "Failed to upsert records"
        );
        throw new DocumentOperationError(
          "upsert",
          `Failed to upsert ${batch.length} records into namespace '${namespace}': ${errorMessage}`,
          ids,
          error instanceof Error ? error : undefined
        );
      }
    }

    this.logger.info(
      {
        metric: "chromadb.upsert_ms",
        value: Date.now() - startTime,
        namespace,
        records: records.length,
      },
      "Records upserted"
    );
  }

  /**
   * Nearest-neighbour query, filtered to `namespace` when given
   *
   * Results keep ChromaDB's ranking (ascending distance).
   */
  async query(query: VectorQuery): Promise<VectorSearchResult[]> {
    const collection = this.requireCollection();

    if (query.embedding.length === 0) {
      throw new InvalidParametersError("Query embedding cannot be empty", "embedding");
    }
    if (!Number.isInteger(query.limit) || query.limit < 1) {
      throw new InvalidParametersError("Limit must be a positive integer", "limit");
    }

    const startTime = Date.now();

    try {
      const result = await collection.query({
        queryEmbeddings: [query.embedding],
        nResults: query.limit,
        ...(query.namespace !== undefined ? { where: { namespace: query.namespace } } : {}),
      });

      const ids = result.ids[0] ?? [];
      const distances = result.distances?.[0] ?? [];
      const documents = result.documents?.[0] ?? [];
      const metadatas = result.metadatas?.[0] ?? [];

      const results = ids.map((id, i) => {
        const distance = distances[i] ?? 2;
        return {
          id,
          content: documents[i] ?? "",
          metadata: toStoredMetadata(metadatas[i] ?? {}),
          distance,
          similarity: convertDistanceToSimilarity(distance),
        };
      });

      this.logger.debug(
        {
          metric: "chromadb.query_ms",
          value: Date.now() - startTime,
          namespace: query.namespace,
          results: results.length,
        },
        "Query complete"
      );

      return results;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new SearchOperationError(
        `Similarity query failed: ${errorMessage}`,
        query.namespace,
        error instanceof Error ? error : undefined
      );
    }
  }

  private validateRecords(records: VectorRecord[]): void {
    const dimensions = records[0]?.embedding.length ?? 0;

    for (const record of records) {
      if (record.id.trim() === "") {
        throw new InvalidParametersError("Record ID cannot be empty", "records.id");
      }
      if (record.text.length === 0) {
        throw new InvalidParametersError(`Record ${record.id} has empty text`, "records.text");
      }
      if (record.embedding.length === 0) {
        throw new InvalidParametersError(
          `Record ${record.id} has an empty embedding`,
          "records.embedding"
        );
      }
      if (record.embedding.length !== dimensions) {
        throw new InvalidParametersError(
          `Record ${record.id} has ${record.embedding.length} dimensions, expected ${dimensions}`,
          "records.embedding"
        );
      }
    }
  }

  private requireCollection(): ChromaCollectionHandle {
    if (!this.collection) {
      throw new StorageConnectionError(
        "Not connected to ChromaDB. Call connect() first.",
        undefined,
        false
      );
    }
    return this.collection;
  }
}
