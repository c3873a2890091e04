/**
 * Embedding provider module exports
 */

export type { EmbeddingProvider, EmbeddingProviderConfig } from "./types.js";

export {
  EmbeddingError,
  EmbeddingAuthenticationError,
  EmbeddingRateLimitError,
  EmbeddingNetworkError,
  EmbeddingTimeoutError,
  EmbeddingValidationError,
} from "./errors.js";

export { OpenAIEmbeddingProvider } from "./openai-embedding.js";
export type { OpenAIProviderConfig, OpenAIEmbeddingsClient } from "./openai-embedding.js";
