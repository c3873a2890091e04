/**
 * Unit tests for application configuration loading
 */

import { describe, test, expect } from "vitest";
import {
  loadAppConfig,
  loadLoggerConfig,
  REQUIRED_ENV_KEYS,
} from "../../../src/config/app-config.js";
import { ConfigurationError } from "../../../src/config/errors.js";

const REQUIRED_ENV: NodeJS.ProcessEnv = {
  GITHUB_PAT: "test-secret",
  OPENAI_API_KEY: "test-secret",
  CHROMADB_URL: "http://localhost:8000",
  CHROMADB_AUTH_TOKEN: "test-secret",
};

function captureError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected a ConfigurationError");
}

describe("loadAppConfig", () => {
  test("applies defaults when only required values are set", () => {
    expect(loadAppConfig(REQUIRED_ENV)).toEqual({
      github: {
        token: "test-secret",
        baseUrl: "https://api.github.com",
        timeoutMs: 30000,
        maxRetries: 3,
      },
      embedding: {
        provider: "openai",
        apiKey: "test-secret",
        baseURL: undefined,
        model: "text-embedding-3-small",
        dimensions: 512,
        batchSize: 100,
        maxRetries: 3,
        timeoutMs: 30000,
      },
      storage: {
        url: "http://localhost:8000",
        authToken: "test-secret",
        collectionName: "github",
        upsertBatchSize: 100,
      },
      ingestion: { fetchConcurrency: 10, maxConcurrentJobs: 2 },
      chunking: { maxChunkTokens: 500, overlapTokens: 50 },
      http: { port: 3001, host: "127.0.0.1" },
      logging: { level: "info", format: "pretty" },
    });
  });

  test("coerces numeric overrides", () => {
    const config = loadAppConfig({
      ...REQUIRED_ENV,
      EMBEDDING_DIMENSIONS: "1536",
      GITHUB_MAX_RETRIES: "0",
      HTTP_PORT: "8080",
      HTTP_HOST: "0.0.0.0",
      CHROMADB_COLLECTION: "repos",
      LOG_LEVEL: "debug",
      LOG_FORMAT: "json",
    });

    expect(config.embedding.dimensions).toBe(1536);
    expect(config.github.maxRetries).toBe(0);
    expect(config.http).toEqual({ port: 8080, host: "0.0.0.0" });
    expect(config.storage.collectionName).toBe("repos");
    expect(config.logging).toEqual({ level: "debug", format: "json" });
  });

  test("lists every missing required key", () => {
    const error = captureError(() =>
      loadAppConfig({ GITHUB_PAT: "test-secret", CHROMADB_URL: "http://localhost:8000" })
    );

    expect(error.message).toBe(
      "Missing required environment variables: OPENAI_API_KEY, CHROMADB_AUTH_TOKEN"
    );
    expect(error.missingKeys).toEqual(["OPENAI_API_KEY", "CHROMADB_AUTH_TOKEN"]);
    expect(error.code).toBe("CONFIGURATION_ERROR");
  });

  test("treats blank values as missing", () => {
    const error = captureError(() => loadAppConfig({ ...REQUIRED_ENV, GITHUB_PAT: "   " }));

    expect(error.missingKeys).toEqual(["GITHUB_PAT"]);
  });

  test("reports all required keys for an empty environment", () => {
    expect(captureError(() => loadAppConfig({})).missingKeys).toEqual([...REQUIRED_ENV_KEYS]);
  });

  test("rejects an out-of-range port", () => {
    const error = captureError(() => loadAppConfig({ ...REQUIRED_ENV, HTTP_PORT: "70000" }));

    expect(error.message).toBe(
      "Invalid configuration: HTTP_PORT: Number must be less than or equal to 65535"
    );
    expect(error.invalidValues).toEqual([
      "HTTP_PORT: Number must be less than or equal to 65535",
    ]);
  });

  test("rejects a non-URL vector store address", () => {
    const error = captureError(() => loadAppConfig({ ...REQUIRED_ENV, CHROMADB_URL: "chroma" }));

    expect(error.invalidValues).toEqual(["CHROMADB_URL: Invalid url"]);
  });

  test("rejects an embedding batch size above the provider limit", () => {
    const error = captureError(() =>
      loadAppConfig({ ...REQUIRED_ENV, EMBEDDING_BATCH_SIZE: "101" })
    );

    expect(error.invalidValues).toEqual([
      "EMBEDDING_BATCH_SIZE: Number must be less than or equal to 100",
    ]);
  });

  test("rejects chunk overlap not smaller than chunk size", () => {
    const error = captureError(() =>
      loadAppConfig({ ...REQUIRED_ENV, CHUNK_MAX_TOKENS: "100", CHUNK_OVERLAP_TOKENS: "100" })
    );

    expect(error.message).toBe(
      "Invalid configuration: CHUNK_OVERLAP_TOKENS: CHUNK_OVERLAP_TOKENS must be less than CHUNK_MAX_TOKENS"
    );
  });

  test("rejects an unknown log level", () => {
    const error = captureError(() => loadAppConfig({ ...REQUIRED_ENV, LOG_LEVEL: "verbose" }));

    expect(error.invalidValues).toHaveLength(1);
    expect(error.invalidValues[0]).toMatch(/^LOG_LEVEL: /);
  });
});

describe("loadLoggerConfig", () => {
  test("defaults to info and pretty", () => {
    expect(loadLoggerConfig({})).toEqual({ level: "info", format: "pretty" });
  });

  test("reads valid values", () => {
    expect(loadLoggerConfig({ LOG_LEVEL: "warn", LOG_FORMAT: "json" })).toEqual({
      level: "warn",
      format: "json",
    });
  });

  test("falls back on invalid values instead of throwing", () => {
    expect(loadLoggerConfig({ LOG_LEVEL: "loud", LOG_FORMAT: "xml" })).toEqual({
      level: "info",
      format: "pretty",
    });
  });
});
