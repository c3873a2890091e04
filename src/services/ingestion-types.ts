/**
 * Types for the ingestion orchestrator, queue and job tracker
 */

import type { DocumentMetadata } from "../ingestion/index.js";

/**
 * One repository ingestion request
 */
export interface IngestionRequest {
  /** `http(s)://github.com/{owner}/{repo}` */
  repoUrl: string;
  /** Branch to read */
  branch: string;
  /** Caller key/value pairs merged over the standard metadata */
  metadata?: DocumentMetadata;
  /** Optional language selector for the file filter */
  language?: string;
}

/**
 * "indexed" when documents were stored, "empty" when nothing matched
 */
export type IngestionStatus = "indexed" | "empty";

/**
 * Outcome of a completed ingestion
 */
export interface IngestionResult {
  owner: string;
  repo: string;
  branch: string;
  namespace: string;
  status: IngestionStatus;
  documentsFetched: number;
  chunksStored: number;
  durationMs: number;
}

/**
 * Lifecycle of a queued ingestion job
 */
export type JobStatus = "pending" | "running" | "completed" | "failed";

/**
 * Internal job record
 */
export interface IngestionJob {
  id: string;
  /** "owner/repo" */
  repository: string;
  branch: string;
  status: JobStatus;
  /** ISO 8601 creation time */
  createdAt: string;
  /** ISO 8601 time the task started running */
  startedAt?: string;
  /** ISO 8601 time the task settled */
  completedAt?: string;
  result?: IngestionResult;
  error?: string;
  /** Error code of a failed job */
  errorCode?: string;
}

/**
 * Job record as served by the HTTP API (snake_case)
 */
export interface JobResponse {
  job_id: string;
  repository: string;
  branch: string;
  status: JobStatus;
  created_at: string;
  started_at?: string;
  completed_at?: string;
  result?: {
    status: IngestionStatus;
    namespace: string;
    documents_fetched: number;
    chunks_stored: number;
    duration_ms: number;
  };
  error?: string;
  error_code?: string;
}
