/**
 * Shared configuration fixtures for tests
 *
 * @module tests/fixtures/config-fixtures
 */

import type { OpenAIProviderConfig } from "../../src/providers/openai-embedding.js";
import type { StorageConfig } from "../../src/storage/types.js";

export const TEST_DIMENSIONS = 8;

export function createProviderConfig(
  overrides: Partial<OpenAIProviderConfig> = {}
): OpenAIProviderConfig {
  return {
    provider: "openai",
    apiKey: "test-secret",
    model: "text-embedding-3-small",
    dimensions: TEST_DIMENSIONS,
    batchSize: 100,
    maxRetries: 0,
    timeoutMs: 30000,
    ...overrides,
  };
}

export function createStorageConfig(overrides: Partial<StorageConfig> = {}): StorageConfig {
  return {
    url: "http://localhost:8000",
    authToken: "test-secret",
    collectionName: "github",
    upsertBatchSize: 100,
    ...overrides,
  };
}
