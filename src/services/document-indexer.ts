/**
 * Document indexer: the embed-and-store step of ingestion.
 *
 * Splits normalized documents into chunks, embeds the chunk texts and
 * upserts the resulting vectors under a namespace.
 *
 * @module services/document-indexer
 */

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import type { DocumentChunker, Document, DocumentChunk } from "../ingestion/index.js";
import type { EmbeddingProvider } from "../providers/index.js";
import type { VectorRecord, VectorStorageClient } from "../storage/index.js";
import { getComponentLogger } from "../logging/index.js";

/**
 * Counts reported by {@link DocumentIndexer.index}
 */
export interface IndexResult {
  /** Distinct documents indexed */
  documents: number;
  /** Chunks embedded and upserted */
  chunks: number;
}

/**
 * Embeds and stores documents
 *
 * @example
 * ```typescript
 * const indexer = new DocumentIndexer(chunker, embeddingProvider, storageClient);
 * const { chunks } = await indexer.index("github_acme_widgets", documents);
 * ```
 */
export class DocumentIndexer {
  private _logger: Logger | null = null;

  constructor(
    private readonly chunker: DocumentChunker,
    private readonly embeddingProvider: EmbeddingProvider,
    private readonly storageClient: VectorStorageClient
  ) {}

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("services:document-indexer");
    }
    return this._logger;
  }

  /**
   * Index documents under `namespace`.
   *
   * Documents sharing an `id` are indexed once (first occurrence wins);
   * documents without one get a random UUID.
   *
   * @throws {ChunkingError} If a document cannot be chunked
   * @throws {EmbeddingError} If embedding fails
   * @throws {StorageError} If the upsert fails
   */
  async index(namespace: string, documents: Document[]): Promise<IndexResult> {
    if (documents.length === 0) {
      return { documents: 0, chunks: 0 };
    }

    const startTime = Date.now();
    const seen = new Set<string>();
    const chunks: DocumentChunk[] = [];
    let duplicates = 0;

    for (const document of documents) {
      const documentId = document.id ?? randomUUID();
      if (seen.has(documentId)) {
        duplicates++;
        continue;
      }
      seen.add(documentId);
      chunks.push(...this.chunker.chunkDocument(document, documentId, namespace));
    }

    if (duplicates > 0) {
      this.logger.debug({ namespace, duplicates }, "Skipped duplicate documents");
    }

    if (chunks.length === 0) {
      this.logger.warn({ namespace, documents: seen.size }, "Documents produced no chunks");
      return { documents: seen.size, chunks: 0 };
    }

    const embeddings = await this.embeddingProvider.generateEmbeddings(
      chunks.map((chunk) => chunk.text)
    );

    const records: VectorRecord[] = chunks.map((chunk, i) => ({
      id: chunk.id,
      embedding: embeddings[i] ?? [],
      text: chunk.text,
      metadata: chunk.metadata,
    }));

    await this.storageClient.upsertRecords(namespace, records);

    this.logger.info(
      {
        metric: "indexer.duration_ms",
        value: Date.now() - startTime,
        namespace,
        documents: seen.size,
        chunks: records.length,
      },
      "Documents indexed"
    );

    return { documents: seen.size, chunks: records.length };
  }
}
