/**
 * OpenAI embedding provider implementation
 *
 * Generates embeddings through the OpenAI Embeddings API with a reduced
 * `dimensions` setting. Handles batching, retries and error sanitization.
 */

import OpenAI from "openai";
import type pino from "pino";
import { getComponentLogger } from "../logging/index.js";
import { createRetryLogger, withRetry } from "../utils/index.js";
import type { EmbeddingProvider, EmbeddingProviderConfig } from "./types.js";
import {
  EmbeddingError,
  EmbeddingAuthenticationError,
  EmbeddingRateLimitError,
  EmbeddingNetworkError,
  EmbeddingTimeoutError,
  EmbeddingValidationError,
} from "./errors.js";

/**
 * OpenAI API limit on inputs per embeddings request
 */
const MAX_BATCH_SIZE = 2048;

/**
 * Configuration specific to the OpenAI provider
 */
export interface OpenAIProviderConfig extends EmbeddingProviderConfig {
  /** OpenAI API key */
  apiKey: string;

  /** Optional organization ID */
  organization?: string;

  /** Optional base URL (proxies, compatible gateways) */
  baseURL?: string;
}

/**
 * The slice of the OpenAI SDK client the provider calls
 */
export interface OpenAIEmbeddingsClient {
  embeddings: {
    create(params: {
      model: string;
      input: string[];
      dimensions?: number;
    }): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}

interface StatusErrorLike {
  status: number;
  message?: string;
  headers?: Record<string, string | null | undefined>;
}

function isStatusError(error: unknown): error is StatusErrorLike {
  return (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number"
  );
}

/**
 * OpenAI embedding provider
 *
 * @example
 * ```typescript
 * const provider = new OpenAIEmbeddingProvider({
 *   provider: "openai",
 *   model: "text-embedding-3-small",
 *   dimensions: 512,
 *   batchSize: 100,
 *   maxRetries: 3,
 *   timeoutMs: 30000,
 *   apiKey: config.embedding.apiKey,
 * });
 *
 * const embedding = await provider.generateEmbedding("Hello world");
 * embedding.length; // 512
 * ```
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly providerId = "openai";
  readonly modelId: string;
  readonly dimensions: number;

  private readonly client: OpenAIEmbeddingsClient;
  private readonly config: OpenAIProviderConfig;
  private _logger: pino.Logger | null = null;

  /**
   * @param config - Provider configuration including API key
   * @param client - SDK client to use instead of constructing one
   * @throws {EmbeddingValidationError} If configuration is invalid
   */
  constructor(config: OpenAIProviderConfig, client?: OpenAIEmbeddingsClient) {
    this.validateConfig(config);
    this.config = config;
    this.modelId = config.model;
    this.dimensions = config.dimensions;

    // SDK retries are disabled; withRetry owns the retry policy
    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        organization: config.organization,
        baseURL: config.baseURL,
        timeout: config.timeoutMs,
        maxRetries: 0,
      });
  }

  private get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("providers:openai");
    }
    return this._logger;
  }

  async generateEmbedding(text: string): Promise<number[]> {
    const [embedding] = await this.generateEmbeddings([text]);
    if (!embedding) {
      throw new EmbeddingError("Provider returned no embedding", "RESPONSE_MISMATCH");
    }
    return embedding;
  }

  /**
   * Embed texts in batches of `batchSize`, sequentially, in input order
   */
  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    this.validateInputs(texts);

    const allEmbeddings: number[][] = [];
    const onRetry = createRetryLogger(
      this.logger,
      "OpenAI embeddings request",
      this.config.maxRetries
    );

    for (const batch of this.createBatches(texts)) {
      const embeddings = await withRetry(() => this.processBatch(batch), {
        maxRetries: this.config.maxRetries,
        shouldRetry: (error) => error instanceof EmbeddingError && error.retryable,
        calculateBackoff: (attempt, error) => this.calculateBackoff(attempt, error),
        onRetry,
      });
      allEmbeddings.push(...embeddings);
    }

    return allEmbeddings;
  }

  /**
   * Embed a short text to verify the key and model. Never throws.
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.generateEmbedding("health check");
      return true;
    } catch (error) {
      this.logger.warn(
        { err: error instanceof Error ? error : new Error(String(error)) },
        "OpenAI embedding health check failed"
      );
      return false;
    }
  }

  private validateConfig(config: OpenAIProviderConfig): void {
    if (!config.apiKey || config.apiKey.trim().length === 0) {
      throw new EmbeddingValidationError("API key is required", "apiKey");
    }

    if (!Number.isInteger(config.dimensions) || config.dimensions <= 0) {
      throw new EmbeddingValidationError("Dimensions must be a positive integer", "dimensions");
    }

    if (config.batchSize <= 0 || config.batchSize > MAX_BATCH_SIZE) {
      throw new EmbeddingValidationError(
        `Batch size must be between 1 and ${MAX_BATCH_SIZE}`,
        "batchSize"
      );
    }

    if (config.maxRetries < 0) {
      throw new EmbeddingValidationError("Max retries must be non-negative", "maxRetries");
    }

    if (config.timeoutMs <= 0) {
      throw new EmbeddingValidationError("Timeout must be positive", "timeoutMs");
    }
  }

  private validateInputs(texts: string[]): void {
    if (texts.length === 0) {
      throw new EmbeddingValidationError("Input array cannot be empty");
    }

    texts.forEach((text, i) => {
      if (text.trim().length === 0) {
        throw new EmbeddingValidationError(
          `Input at index ${i} cannot be empty or whitespace only`,
          `texts[${i}]`
        );
      }
    });
  }

  private createBatches(texts: string[]): string[][] {
    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += this.config.batchSize) {
      batches.push(texts.slice(i, i + this.config.batchSize));
    }
    return batches;
  }

  /**
   * One embeddings request, no retry
   */
  private async processBatch(batch: string[]): Promise<number[][]> {
    try {
      const response = await this.client.embeddings.create({
        model: this.modelId,
        input: batch,
        dimensions: this.dimensions,
      });

      // The API tags each vector with its input index
      const embeddings = [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => item.embedding);

      if (embeddings.length !== batch.length) {
        throw new EmbeddingError(
          `Expected ${batch.length} embeddings, got ${embeddings.length}`,
          "RESPONSE_MISMATCH"
        );
      }

      const wrongSize = embeddings.find((embedding) => embedding.length !== this.dimensions);
      if (wrongSize) {
        throw new EmbeddingError(
          `Expected ${this.dimensions}-dimensional embeddings, got ${wrongSize.length}`,
          "DIMENSION_MISMATCH"
        );
      }

      return embeddings;
    } catch (error) {
      throw this.handleOpenAIError(error);
    }
  }

  /**
   * Map SDK and transport errors onto EmbeddingError subclasses
   */
  private handleOpenAIError(error: unknown): EmbeddingError {
    if (error instanceof EmbeddingError) {
      return error;
    }

    const cause = error instanceof Error ? error : new Error(String(error));

    if (isStatusError(error)) {
      const message = error.message || "Unknown error";

      switch (error.status) {
        case 401:
        case 403:
          return new EmbeddingAuthenticationError(
            "Invalid API key or insufficient permissions",
            cause
          );
        case 429:
          return new EmbeddingRateLimitError(
            "Rate limit exceeded",
            this.extractRetryAfter(error),
            cause
          );
        case 408:
        case 504:
          return new EmbeddingTimeoutError("Request timeout", cause);
        default:
          if (error.status >= 500) {
            return new EmbeddingNetworkError(`Server error: ${message}`, cause);
          }
          return new EmbeddingValidationError(`Client error: ${message}`, undefined, cause);
      }
    }

    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new EmbeddingTimeoutError("Request timeout", cause);
    }
    if (error instanceof OpenAI.APIConnectionError) {
      return new EmbeddingNetworkError("Connection failed", cause);
    }

    const lower = cause.message.toLowerCase();
    if (lower.includes("econnrefused") || lower.includes("enotfound") || lower.includes("econnreset")) {
      return new EmbeddingNetworkError("Connection failed", cause);
    }
    if (lower.includes("timeout") || lower.includes("etimedout")) {
      return new EmbeddingTimeoutError("Request timeout", cause);
    }

    return new EmbeddingError(cause.message || "Unknown error", "UNKNOWN_ERROR", false, cause);
  }

  private extractRetryAfter(error: StatusErrorLike): number | undefined {
    const header = error.headers?.["retry-after"];
    if (header) {
      const seconds = parseInt(header, 10);
      if (!isNaN(seconds)) {
        return seconds * 1000;
      }
    }
    return undefined;
  }

  /**
   * Retry-After wins for rate limits; otherwise 1s, 2s, 4s, ...
   */
  private calculateBackoff(attempt: number, error: Error): number {
    if (error instanceof EmbeddingRateLimitError && error.retryAfterMs !== undefined) {
      return error.retryAfterMs;
    }
    return Math.pow(2, attempt) * 1000;
  }
}
