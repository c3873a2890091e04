/**
 * Job Tracker for background ingestion
 *
 * Keeps an in-memory record per queued ingestion so callers can poll for
 * the outcome of a request that was answered before the work ran.
 *
 * @module services/job-tracker
 */

import { randomBytes } from "node:crypto";
import type { Logger } from "pino";
import { getComponentLogger } from "../logging/index.js";
import type { IngestionJob, IngestionResult, JobResponse } from "./ingestion-types.js";

/**
 * Configuration for the job tracker
 */
export interface JobTrackerConfig {
  /** Maximum age of completed jobs before cleanup (default: 1 hour) */
  maxJobAgeMs?: number;
  /** Maximum number of jobs to keep (default: 100) */
  maxJobs?: number;
}

const DEFAULT_MAX_JOB_AGE_MS = 60 * 60 * 1000;
const DEFAULT_MAX_JOBS = 100;

/**
 * In-memory job registry with age and size bounds
 *
 * @example
 * ```typescript
 * const tracker = new JobTracker();
 * const jobId = tracker.createJob("acme/widgets", "main");
 * tracker.markRunning(jobId);
 * tracker.complete(jobId, result);
 * tracker.getJobResponse(jobId)?.status; // "completed"
 * ```
 */
export class JobTracker {
  private readonly jobs: Map<string, IngestionJob> = new Map();
  private readonly maxJobAgeMs: number;
  private readonly maxJobs: number;
  private _logger: Logger | null = null;

  constructor(config: JobTrackerConfig = {}) {
    this.maxJobAgeMs = config.maxJobAgeMs ?? DEFAULT_MAX_JOB_AGE_MS;
    this.maxJobs = config.maxJobs ?? DEFAULT_MAX_JOBS;
  }

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("services:job-tracker");
    }
    return this._logger;
  }

  /**
   * Format: "ingest-{base36 timestamp}-{8 hex chars}"
   */
  private generateJobId(): string {
    const timestamp = Date.now().toString(36);
    const random = randomBytes(4).toString("hex");
    return `ingest-${timestamp}-${random}`;
  }

  /**
   * Register a pending job
   *
   * @param repository - "owner/repo"
   * @returns New job id
   */
  createJob(repository: string, branch: string): string {
    this.cleanup();

    const id = this.generateJobId();
    this.jobs.set(id, {
      id,
      repository,
      branch,
      status: "pending",
      createdAt: new Date().toISOString(),
    });
    this.logger.debug({ jobId: id, repository, branch }, "Created ingestion job");

    return id;
  }

  markRunning(jobId: string): void {
    const job = this.jobs.get(jobId);
    if (!job) {
      this.logger.warn({ jobId }, "Attempted to start non-existent job");
      return;
    }

    job.status = "running";
    job.startedAt = new Date().toISOString();
  }

  complete(jobId: string, result: IngestionResult): void {
    const job = this.jobs.get(jobId);
    if (!job) {
      this.logger.warn({ jobId }, "Attempted to complete non-existent job");
      return;
    }

    job.status = "completed";
    job.completedAt = new Date().toISOString();
    job.result = result;
  }

  fail(jobId: string, error: string, errorCode?: string): void {
    const job = this.jobs.get(jobId);
    if (!job) {
      this.logger.warn({ jobId }, "Attempted to fail non-existent job");
      return;
    }

    job.status = "failed";
    job.completedAt = new Date().toISOString();
    job.error = error;
    job.errorCode = errorCode;
  }

  getJob(jobId: string): IngestionJob | null {
    return this.jobs.get(jobId) ?? null;
  }

  /**
   * Job in HTTP response format, or null if unknown
   */
  getJobResponse(jobId: string): JobResponse | null {
    const job = this.jobs.get(jobId);
    return job ? formatJobResponse(job) : null;
  }

  /**
   * Drop completed jobs older than `maxJobAgeMs`, then the oldest completed
   * jobs while more than `maxJobs` remain. Unfinished jobs are never dropped.
   */
  cleanup(): void {
    const now = Date.now();
    let deleted = 0;

    for (const [id, job] of this.jobs) {
      if (job.completedAt && now - Date.parse(job.completedAt) > this.maxJobAgeMs) {
        this.jobs.delete(id);
        deleted++;
      }
    }

    if (this.jobs.size > this.maxJobs) {
      const completed = Array.from(this.jobs.values())
        .filter((job) => job.completedAt !== undefined)
        .sort((a, b) => Date.parse(a.completedAt ?? "") - Date.parse(b.completedAt ?? ""));

      const excess = this.jobs.size - this.maxJobs;
      for (const job of completed.slice(0, excess)) {
        this.jobs.delete(job.id);
        deleted++;
      }
    }

    if (deleted > 0) {
      this.logger.debug({ deletedCount: deleted, remainingJobs: this.jobs.size }, "Cleaned up old jobs");
    }
  }

  /**
   * Clear all jobs (for testing)
   */
  clear(): void {
    this.jobs.clear();
  }

  size(): number {
    return this.jobs.size;
  }
}

function formatJobResponse(job: IngestionJob): JobResponse {
  const response: JobResponse = {
    job_id: job.id,
    repository: job.repository,
    branch: job.branch,
    status: job.status,
    created_at: job.createdAt,
  };

  if (job.startedAt) {
    response.started_at = job.startedAt;
  }
  if (job.completedAt) {
    response.completed_at = job.completedAt;
  }
  if (job.result) {
    response.result = {
      status: job.result.status,
      namespace: job.result.namespace,
      documents_fetched: job.result.documentsFetched,
      chunks_stored: job.result.chunksStored,
      duration_ms: job.result.durationMs,
    };
  }
  if (job.error) {
    response.error = job.error;
  }
  if (job.errorCode) {
    response.error_code = job.errorCode;
  }

  return response;
}
