/**
 * Unit tests for JobTracker
 */

import { describe, test, expect, beforeAll, beforeEach, afterEach, vi } from "vitest";
import { JobTracker } from "../../../src/services/job-tracker.js";
import type { IngestionResult } from "../../../src/services/ingestion-types.js";
import { initializeLogger } from "../../../src/logging/index.js";

beforeAll(() => {
  initializeLogger({ level: "silent", format: "json" });
});

const result: IngestionResult = {
  owner: "acme",
  repo: "widgets",
  branch: "main",
  namespace: "github_acme_widgets",
  status: "indexed",
  documentsFetched: 3,
  chunksStored: 7,
  durationMs: 42,
};

describe("JobTracker", () => {
  let tracker: JobTracker;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-15T10:00:00.000Z"));
    tracker = new JobTracker();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("creates pending jobs with unique ids", () => {
    const first = tracker.createJob("acme/widgets", "main");
    const second = tracker.createJob("acme/widgets", "main");

    expect(first).toMatch(/^ingest-[0-9a-z]+-[0-9a-f]{8}$/);
    expect(second).not.toBe(first);
    expect(tracker.getJob(first)).toEqual({
      id: first,
      repository: "acme/widgets",
      branch: "main",
      status: "pending",
      createdAt: "2026-01-15T10:00:00.000Z",
    });
    expect(tracker.size()).toBe(2);
  });

  test("formats a completed job for HTTP responses", () => {
    const jobId = tracker.createJob("acme/widgets", "main");
    vi.advanceTimersByTime(1000);
    tracker.markRunning(jobId);
    vi.advanceTimersByTime(2000);
    tracker.complete(jobId, result);

    expect(tracker.getJobResponse(jobId)).toEqual({
      job_id: jobId,
      repository: "acme/widgets",
      branch: "main",
      status: "completed",
      created_at: "2026-01-15T10:00:00.000Z",
      started_at: "2026-01-15T10:00:01.000Z",
      completed_at: "2026-01-15T10:00:03.000Z",
      result: {
        status: "indexed",
        namespace: "github_acme_widgets",
        documents_fetched: 3,
        chunks_stored: 7,
        duration_ms: 42,
      },
    });
  });

  test("records failures with an error code", () => {
    const jobId = tracker.createJob("acme/missing", "main");
    tracker.markRunning(jobId);
    tracker.fail(jobId, "Failed to access repository acme/missing", "SOURCE_FETCH_ERROR");

    expect(tracker.getJobResponse(jobId)).toMatchObject({
      status: "failed",
      error: "Failed to access repository acme/missing",
      error_code: "SOURCE_FETCH_ERROR",
    });
  });

  test("returns null for unknown jobs", () => {
    expect(tracker.getJob("ingest-unknown")).toBeNull();
    expect(tracker.getJobResponse("ingest-unknown")).toBeNull();
  });

  test("ignores updates to unknown jobs", () => {
    expect(() => tracker.markRunning("nope")).not.toThrow();
    expect(() => tracker.complete("nope", result)).not.toThrow();
    expect(() => tracker.fail("nope", "error")).not.toThrow();
    expect(tracker.size()).toBe(0);
  });

  test("drops completed jobs older than the maximum age", () => {
    const finished = tracker.createJob("acme/old", "main");
    tracker.complete(finished, result);
    const running = tracker.createJob("acme/slow", "main");
    tracker.markRunning(running);

    vi.advanceTimersByTime(60 * 60 * 1000 + 1);
    tracker.createJob("acme/new", "main");

    expect(tracker.getJob(finished)).toBeNull();
    expect(tracker.getJob(running)?.status).toBe("running");
    expect(tracker.size()).toBe(2);
  });

  test("drops the oldest completed jobs beyond the job limit", () => {
    tracker = new JobTracker({ maxJobs: 2 });
    const first = tracker.createJob("acme/a", "main");
    tracker.complete(first, result);
    vi.advanceTimersByTime(1000);
    const second = tracker.createJob("acme/b", "main");
    tracker.complete(second, result);
    vi.advanceTimersByTime(1000);
    tracker.createJob("acme/c", "main");

    tracker.createJob("acme/d", "main");

    expect(tracker.getJob(first)).toBeNull();
    expect(tracker.getJob(second)).not.toBeNull();
  });

  test("clear removes every job", () => {
    tracker.createJob("acme/widgets", "main");
    tracker.clear();
    expect(tracker.size()).toBe(0);
  });
});
