/**
 * Type definitions for embedding providers
 *
 * The ingestion pipeline treats embedding as a black box from text to a
 * fixed-length vector; this interface is that box.
 */

/**
 * Configuration shared by embedding provider implementations
 */
export interface EmbeddingProviderConfig {
  /** Provider identifier (currently only "openai") */
  provider: string;

  /** Model identifier, e.g. "text-embedding-3-small" */
  model: string;

  /** Embedding vector dimensions; must match the vector store */
  dimensions: number;

  /** Maximum number of texts per request */
  batchSize: number;

  /** Maximum retry attempts for retryable errors */
  maxRetries: number;

  /** Request timeout in milliseconds */
  timeoutMs: number;
}

/**
 * Text-to-vector embedding provider
 *
 * Implementations handle authentication, batching and retries, and must
 * keep credentials out of error messages.
 *
 * @example
 * ```typescript
 * const [first, second] = await provider.generateEmbeddings(["alpha", "beta"]);
 * ```
 */
export interface EmbeddingProvider {
  readonly providerId: string;
  readonly modelId: string;
  readonly dimensions: number;

  /**
   * Embed a single text
   *
   * @throws {EmbeddingValidationError} If text is empty
   * @throws {EmbeddingError} For provider failures
   */
  generateEmbedding(text: string): Promise<number[]>;

  /**
   * Embed several texts, returning vectors in input order
   *
   * @throws {EmbeddingValidationError} If the array or any text is empty
   * @throws {EmbeddingError} For provider failures
   */
  generateEmbeddings(texts: string[]): Promise<number[][]>;

  /**
   * Whether the provider is reachable and configured. Never throws.
   */
  healthCheck(): Promise<boolean>;
}
