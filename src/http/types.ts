/**
 * HTTP API Type Definitions
 */

import type { StoredMetadata } from "../storage/index.js";

/**
 * HTTP listener configuration
 */
export interface HttpServerConfig {
  /** Port to bind; 0 picks a free port */
  port: number;
  /** Interface to bind */
  host: string;
}

/**
 * GET /health response
 */
export interface HealthResponse {
  status: "healthy";
  service: string;
  /** ISO 8601 */
  timestamp: string;
  version: string;
}

/**
 * POST /ingest response (202)
 */
export interface IngestAcceptedResponse {
  status: "accepted";
  message: string;
  repository: {
    owner: string;
    repo: string;
    branch: string;
  };
  job_id: string;
}

/**
 * POST /query response
 */
export interface QueryResponse {
  status: "success" | "error";
  results: Array<{
    id: string;
    text: string;
    metadata: StoredMetadata;
    score: number;
  }>;
  message: string;
}

/**
 * HTTP server instance with additional metadata
 */
export interface HttpServerInstance {
  /** Close the HTTP server gracefully */
  close: () => Promise<void>;

  /** The port the server is actually listening on */
  port: number;

  /** The host the server is bound to */
  host: string;
}
