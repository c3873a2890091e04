/**
 * Bounded background queue for repository ingestion
 *
 * Ingestion requests are acknowledged before they run. The queue records
 * each one in the {@link JobTracker} and runs at most `maxConcurrentJobs`
 * at a time; failures end up in the job record and the log, never with
 * the submitter.
 *
 * @module services/ingestion-queue
 */

import pLimit, { type LimitFunction } from "p-limit";
import type { Logger } from "pino";
import { getComponentLogger } from "../logging/index.js";
import { parseGitHubRepositoryUrl } from "../utils/index.js";
import type { IngestionService } from "./ingestion-service.js";
import type { IngestionRequest } from "./ingestion-types.js";
import type { JobTracker } from "./job-tracker.js";

/**
 * Runs one ingestion
 */
export type IngestionRunner = Pick<IngestionService, "ingest">;

export interface IngestionQueueConfig {
  /**
   * Ingestions allowed to run at once
   * @default 2
   */
  maxConcurrentJobs?: number;
}

const DEFAULT_MAX_CONCURRENT_JOBS = 2;

function errorCode(error: unknown): string {
  if (typeof error === "object" && error !== null && "code" in error) {
    const code = error.code;
    if (typeof code === "string") {
      return code;
    }
  }
  return "INTERNAL_ERROR";
}

/**
 * Job queue in front of {@link IngestionService}
 *
 * @example
 * ```typescript
 * const queue = new IngestionQueue(ingestionService, jobTracker, { maxConcurrentJobs: 2 });
 * const jobId = queue.submit({ repoUrl: "https://github.com/acme/widgets", branch: "main" });
 * await queue.onIdle();
 * jobTracker.getJob(jobId)?.status; // "completed" or "failed"
 * ```
 */
export class IngestionQueue {
  private readonly limit: LimitFunction;
  private readonly inFlight = new Set<Promise<void>>();
  private _logger: Logger | null = null;

  constructor(
    private readonly service: IngestionRunner,
    private readonly tracker: JobTracker,
    config: IngestionQueueConfig = {}
  ) {
    const maxConcurrentJobs = config.maxConcurrentJobs ?? DEFAULT_MAX_CONCURRENT_JOBS;
    if (!Number.isInteger(maxConcurrentJobs) || maxConcurrentJobs < 1) {
      throw new RangeError(
        `Max concurrent jobs must be a positive integer, got ${maxConcurrentJobs}`
      );
    }
    this.limit = pLimit(maxConcurrentJobs);
  }

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("services:ingestion-queue");
    }
    return this._logger;
  }

  /**
   * Record a pending job and schedule the ingestion
   *
   * @returns Job id for polling
   * @throws {InvalidInputError} If the repository URL is malformed
   */
  submit(request: IngestionRequest): string {
    const { owner, repo } = parseGitHubRepositoryUrl(request.repoUrl);
    const jobId = this.tracker.createJob(`${owner}/${repo}`, request.branch);

    const task: Promise<void> = this.limit(() => this.run(jobId, request))
      .catch((error: unknown) => {
        this.logger.error({ jobId, err: error }, "Ingestion task crashed");
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);

    this.logger.info(
      { jobId, owner, repo, branch: request.branch, pending: this.limit.pendingCount },
      "Ingestion job queued"
    );

    return jobId;
  }

  /**
   * Resolves once every submitted task has settled
   */
  async onIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  /** Tasks waiting for a slot */
  pendingCount(): number {
    return this.limit.pendingCount;
  }

  /** Tasks currently running */
  activeCount(): number {
    return this.limit.activeCount;
  }

  private async run(jobId: string, request: IngestionRequest): Promise<void> {
    this.tracker.markRunning(jobId);

    try {
      const result = await this.service.ingest(request);
      this.tracker.complete(jobId, result);
      this.logger.info(
        {
          jobId,
          namespace: result.namespace,
          status: result.status,
          documentsFetched: result.documentsFetched,
          chunksStored: result.chunksStored,
          durationMs: result.durationMs,
        },
        "Ingestion job completed"
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const code = errorCode(error);
      this.tracker.fail(jobId, message, code);
      this.logger.error({ jobId, code, err: error }, "Ingestion job failed");
    }
  }
}
