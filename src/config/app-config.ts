/**
 * Application Configuration
 *
 * Loads and validates process configuration from environment variables.
 * Secrets for the source host, embedding provider and vector store are
 * required; everything else has a default.
 *
 * @module config/app-config
 */

import { z } from "zod";
import { LOG_FORMATS, LOG_LEVELS, type LoggerConfig } from "../logging/types.js";
import { ConfigurationError } from "./errors.js";

/**
 * Environment variables that must be present and non-blank
 */
export const REQUIRED_ENV_KEYS = [
  "GITHUB_PAT",
  "OPENAI_API_KEY",
  "CHROMADB_URL",
  "CHROMADB_AUTH_TOKEN",
] as const;

const positiveInt = (defaultValue: number) => z.coerce.number().int().positive().default(defaultValue);

const nonNegativeInt = (defaultValue: number) => z.coerce.number().int().min(0).default(defaultValue);

/**
 * Zod schema for the process environment
 */
const EnvSchema = z
  .object({
    GITHUB_PAT: z.string(),
    GITHUB_API_URL: z.string().url().default("https://api.github.com"),
    GITHUB_TIMEOUT_MS: positiveInt(30000),
    GITHUB_MAX_RETRIES: nonNegativeInt(3),

    OPENAI_API_KEY: z.string(),
    OPENAI_BASE_URL: z.string().url().optional(),
    EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
    EMBEDDING_DIMENSIONS: positiveInt(512),
    EMBEDDING_BATCH_SIZE: z.coerce.number().int().min(1).max(100).default(100),
    EMBEDDING_MAX_RETRIES: nonNegativeInt(3),
    EMBEDDING_TIMEOUT_MS: positiveInt(30000),

    CHROMADB_URL: z.string().url(),
    CHROMADB_AUTH_TOKEN: z.string(),
    CHROMADB_COLLECTION: z.string().default("github"),
    STORAGE_UPSERT_BATCH_SIZE: positiveInt(100),

    INGEST_FETCH_CONCURRENCY: positiveInt(10),
    INGEST_MAX_CONCURRENT_JOBS: positiveInt(2),
    CHUNK_MAX_TOKENS: positiveInt(500),
    CHUNK_OVERLAP_TOKENS: nonNegativeInt(50),

    HTTP_PORT: z.coerce.number().int().min(0).max(65535).default(3001),
    HTTP_HOST: z.string().default("127.0.0.1"),

    LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
    LOG_FORMAT: z.enum(LOG_FORMATS).default("pretty"),
  })
  .refine((env) => env.CHUNK_OVERLAP_TOKENS < env.CHUNK_MAX_TOKENS, {
    message: "CHUNK_OVERLAP_TOKENS must be less than CHUNK_MAX_TOKENS",
    path: ["CHUNK_OVERLAP_TOKENS"],
  });

/**
 * Typed application configuration
 */
export interface AppConfig {
  github: {
    token: string;
    baseUrl: string;
    timeoutMs: number;
    maxRetries: number;
  };
  embedding: {
    provider: "openai";
    apiKey: string;
    baseURL?: string;
    model: string;
    dimensions: number;
    batchSize: number;
    maxRetries: number;
    timeoutMs: number;
  };
  storage: {
    url: string;
    authToken: string;
    collectionName: string;
    upsertBatchSize: number;
  };
  ingestion: {
    fetchConcurrency: number;
    maxConcurrentJobs: number;
  };
  chunking: {
    maxChunkTokens: number;
    overlapTokens: number;
  };
  http: {
    port: number;
    host: string;
  };
  logging: Omit<LoggerConfig, "stream">;
}

/**
 * Drop blank values so `KEY=` in a .env file counts as unset
 */
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

/**
 * Load and validate application configuration
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws {ConfigurationError} If a required value is missing or any value is invalid
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const source = withoutBlankValues(env);

  const missingKeys = REQUIRED_ENV_KEYS.filter((key) => source[key] === undefined);
  if (missingKeys.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missingKeys.join(", ")}`,
      [...missingKeys]
    );
  }

  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const invalidValues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigurationError(
      `Invalid configuration: ${invalidValues.join("; ")}`,
      [],
      invalidValues
    );
  }

  const values = parsed.data;

  return {
    github: {
      token: values.GITHUB_PAT,
      baseUrl: values.GITHUB_API_URL,
      timeoutMs: values.GITHUB_TIMEOUT_MS,
      maxRetries: values.GITHUB_MAX_RETRIES,
    },
    embedding: {
      provider: "openai",
      apiKey: values.OPENAI_API_KEY,
      baseURL: values.OPENAI_BASE_URL,
      model: values.EMBEDDING_MODEL,
      dimensions: values.EMBEDDING_DIMENSIONS,
      batchSize: values.EMBEDDING_BATCH_SIZE,
      maxRetries: values.EMBEDDING_MAX_RETRIES,
      timeoutMs: values.EMBEDDING_TIMEOUT_MS,
    },
    storage: {
      url: values.CHROMADB_URL,
      authToken: values.CHROMADB_AUTH_TOKEN,
      collectionName: values.CHROMADB_COLLECTION,
      upsertBatchSize: values.STORAGE_UPSERT_BATCH_SIZE,
    },
    ingestion: {
      fetchConcurrency: values.INGEST_FETCH_CONCURRENCY,
      maxConcurrentJobs: values.INGEST_MAX_CONCURRENT_JOBS,
    },
    chunking: {
      maxChunkTokens: values.CHUNK_MAX_TOKENS,
      overlapTokens: values.CHUNK_OVERLAP_TOKENS,
    },
    http: {
      port: values.HTTP_PORT,
      host: values.HTTP_HOST,
    },
    logging: {
      level: values.LOG_LEVEL,
      format: values.LOG_FORMAT,
    },
  };
}

const LoggerEnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).catch("info"),
  LOG_FORMAT: z.enum(LOG_FORMATS).catch("pretty"),
});

/**
 * Read logger settings without failing
 *
 * The logger has to exist before full configuration is validated so that
 * configuration errors can be logged. Invalid values fall back to defaults.
 */
export function loadLoggerConfig(env: NodeJS.ProcessEnv = process.env): Omit<LoggerConfig, "stream"> {
  const values = LoggerEnvSchema.parse({
    LOG_LEVEL: env["LOG_LEVEL"],
    LOG_FORMAT: env["LOG_FORMAT"],
  });
  return { level: values.LOG_LEVEL, format: values.LOG_FORMAT };
}
