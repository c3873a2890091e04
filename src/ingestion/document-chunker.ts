/**
 * Document chunker for preparing documents for embedding.
 *
 * Splits document text on line boundaries into chunks that fit the
 * embedding model's input budget, repeating a few lines between consecutive
 * chunks for context.
 *
 * @module ingestion/document-chunker
 */

import crypto from "node:crypto";
import type pino from "pino";
import { getComponentLogger } from "../logging/index.js";
import { ChunkingError, IngestionError } from "./errors.js";
import type { ChunkerConfig, Document, DocumentChunk } from "./types.js";

interface ChunkBoundary {
  lines: string[];
  /** 1-based */
  startLine: number;
  /** 1-based, inclusive */
  endLine: number;
}

/**
 * A source line, or a piece of one too long to fit a chunk on its own
 */
interface LineSegment {
  text: string;
  /** 1-based line the segment came from */
  line: number;
}

/**
 * Characters per estimated token, see {@link estimateTokens}
 */
const CHARS_PER_TOKEN = 4;

/**
 * Estimate token count at roughly four characters per token.
 *
 * Overestimates slightly for typical source code, which keeps chunks under
 * the embedding API limit.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

function computeContentHash(content: string): string {
  return crypto.createHash("sha256").update(content, "utf8").digest("hex");
}

/**
 * Chunk identifier: `{namespace}:{documentId}:{chunkIndex}`
 */
export function createChunkId(namespace: string, documentId: string, chunkIndex: number): string {
  return `${namespace}:${documentId}:${chunkIndex}`;
}

/**
 * Length of the segments joined with newlines
 */
function joinedLength(segments: readonly LineSegment[]): number {
  const textLength = segments.reduce((sum, segment) => sum + segment.text.length, 0);
  return textLength + Math.max(0, segments.length - 1);
}

/**
 * Split lines into segments of at most `maxChars` characters.
 *
 * Minified sources and notebook outputs can put an entire file on one
 * line; their pieces keep the original line number.
 */
function toSegments(lines: readonly string[], maxChars: number): LineSegment[] {
  const segments: LineSegment[] = [];

  lines.forEach((text, i) => {
    if (text.length <= maxChars) {
      segments.push({ text, line: i + 1 });
      return;
    }
    for (let offset = 0; offset < text.length; offset += maxChars) {
      segments.push({ text: text.slice(offset, offset + maxChars), line: i + 1 });
    }
  });

  return segments;
}

/**
 * Segments from the end of a chunk that fit the overlap budget.
 */
function getOverlapSegments(segments: readonly LineSegment[], maxChars: number): LineSegment[] {
  const overlap: LineSegment[] = [];

  for (let i = segments.length - 1; i >= 0; i--) {
    const segment = segments[i];
    if (!segment || joinedLength([segment, ...overlap]) > maxChars) {
      break;
    }
    overlap.unshift(segment);
  }

  return overlap;
}

/**
 * Splits documents into embedding-sized chunks.
 *
 * @example
 * ```typescript
 * const chunker = new DocumentChunker({ maxChunkTokens: 500, overlapTokens: 50 });
 * const chunks = chunker.chunkDocument(document, "abc123", "github_acme_widgets");
 * ```
 */
export class DocumentChunker {
  static readonly MAX_CHUNKS_PER_DOCUMENT = 100;

  private readonly config: Required<ChunkerConfig>;
  private _logger: pino.Logger | null = null;

  /**
   * @throws {IngestionError} If overlap is not smaller than the chunk size
   */
  constructor(config: ChunkerConfig = {}) {
    const maxChunkTokens = config.maxChunkTokens ?? 500;
    const overlapTokens = config.overlapTokens ?? 50;

    if (!Number.isInteger(maxChunkTokens) || maxChunkTokens < 1) {
      throw new IngestionError(
        `Max chunk tokens must be a positive integer, got ${maxChunkTokens}`,
        "INVALID_CHUNKER_CONFIG"
      );
    }
    if (!Number.isInteger(overlapTokens) || overlapTokens < 0) {
      throw new IngestionError(
        `Overlap tokens must be a non-negative integer, got ${overlapTokens}`,
        "INVALID_CHUNKER_CONFIG"
      );
    }
    if (overlapTokens >= maxChunkTokens) {
      throw new IngestionError(
        `Overlap tokens (${overlapTokens}) must be less than max chunk tokens (${maxChunkTokens})`,
        "INVALID_CHUNKER_CONFIG"
      );
    }

    this.config = { maxChunkTokens, overlapTokens };
  }

  private get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("ingestion:document-chunker");
    }
    return this._logger;
  }

  getConfig(): Readonly<Required<ChunkerConfig>> {
    return this.config;
  }

  /**
   * Split a document into chunks.
   *
   * Chunk metadata is the document metadata plus `file_path` (when the
   * document has a path), `chunk_index`, `total_chunks`, `start_line`,
   * `end_line` and `content_hash`. Documents beyond
   * {@link DocumentChunker.MAX_CHUNKS_PER_DOCUMENT} chunks are truncated.
   *
   * @param document - Document to split
   * @param documentId - Identifier used in chunk ids
   * @param namespace - Namespace used in chunk ids
   * @returns Chunks in document order; empty for whitespace-only text
   * @throws {ChunkingError} If splitting fails
   */
  chunkDocument(document: Document, documentId: string, namespace: string): DocumentChunk[] {
    if (document.text.trim().length === 0) {
      return [];
    }

    try {
      const boundaries = this.splitIntoChunkBoundaries(document.text.split("\n"));

      if (boundaries.length > DocumentChunker.MAX_CHUNKS_PER_DOCUMENT) {
        this.logger.warn(
          {
            documentId,
            path: document.path,
            chunkCount: boundaries.length,
            limit: DocumentChunker.MAX_CHUNKS_PER_DOCUMENT,
          },
          `Document exceeds chunk limit, truncating to ${DocumentChunker.MAX_CHUNKS_PER_DOCUMENT} chunks`
        );
        boundaries.splice(DocumentChunker.MAX_CHUNKS_PER_DOCUMENT);
      }

      const totalChunks = boundaries.length;

      return boundaries.map((boundary, index) => {
        const text = boundary.lines.join("\n");
        return {
          id: createChunkId(namespace, documentId, index),
          text,
          metadata: {
            ...document.metadata,
            ...(document.path !== undefined ? { file_path: document.path } : {}),
            chunk_index: index,
            total_chunks: totalChunks,
            start_line: boundary.startLine,
            end_line: boundary.endLine,
            content_hash: computeContentHash(text),
          },
          chunkIndex: index,
          totalChunks,
          startLine: boundary.startLine,
          endLine: boundary.endLine,
        };
      });
    } catch (error) {
      throw new ChunkingError(
        `Failed to chunk document ${documentId}: ${
          error instanceof Error ? error.message : "unknown error"
        }`,
        documentId,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Every boundary's joined text stays within `maxChunkTokens`.
   */
  private splitIntoChunkBoundaries(lines: string[]): ChunkBoundary[] {
    const maxChars = this.config.maxChunkTokens * CHARS_PER_TOKEN;
    const overlapChars = this.config.overlapTokens * CHARS_PER_TOKEN;
    const boundaries: ChunkBoundary[] = [];

    let current: LineSegment[] = [];
    let currentLength = 0;

    const flush = (): void => {
      const first = current[0];
      const last = current[current.length - 1];
      if (first && last) {
        boundaries.push({
          lines: current.map((segment) => segment.text),
          startLine: first.line,
          endLine: last.line,
        });
      }
    };

    for (const segment of toSegments(lines, maxChars)) {
      const separator = current.length > 0 ? 1 : 0;

      if (current.length > 0 && currentLength + separator + segment.text.length > maxChars) {
        flush();

        const overlap = getOverlapSegments(current, overlapChars);
        // Drop leading overlap until the new segment fits beside it
        while (overlap.length > 0 && joinedLength([...overlap, segment]) > maxChars) {
          overlap.shift();
        }
        current = [...overlap, segment];
        currentLength = joinedLength(current);
      } else {
        current.push(segment);
        currentLength += separator + segment.text.length;
      }
    }

    flush();

    return boundaries;
  }
}
