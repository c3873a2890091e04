/**
 * Ingestion Routes
 *
 * POST /ingest validates the request, queues the ingestion and answers 202
 * before any repository content is read. GET /ingest/jobs/:jobId reports
 * the outcome.
 */

import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import { InvalidInputError } from "../../ingestion/index.js";
import { parseGitHubRepositoryUrl } from "../../utils/index.js";
import type { IngestionQueue, JobTracker } from "../../services/index.js";
import { badRequest, notFound } from "../middleware/error-handler.js";
import type { IngestAcceptedResponse } from "../types.js";

/**
 * POST /ingest body
 */
export const IngestRequestSchema = z
  .object({
    repo_url: z.string({
      required_error: "repo_url is required",
      invalid_type_error: "repo_url must be a string",
    }),
    branch: z.string().min(1, "branch must not be empty").default("main"),
    metadata: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).default({}),
    language: z.string().optional(),
  })
  .strict();

export type IngestRequestBody = z.infer<typeof IngestRequestSchema>;

export interface IngestRouteDependencies {
  ingestionQueue: Pick<IngestionQueue, "submit">;
  jobTracker: Pick<JobTracker, "getJobResponse">;
}

/**
 * Create ingestion router
 */
export function createIngestRouter(deps: IngestRouteDependencies): Router {
  const router = Router();

  router.post("/ingest", (req: Request, res: Response, next: NextFunction): void => {
    const parsed = IngestRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) =>
          issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
        )
        .join("; ");
      next(badRequest(`Invalid request body: ${details}`, "VALIDATION_ERROR"));
      return;
    }

    const body = parsed.data;

    try {
      const { owner, repo } = parseGitHubRepositoryUrl(body.repo_url);
      const jobId = deps.ingestionQueue.submit({
        repoUrl: body.repo_url,
        branch: body.branch,
        metadata: body.metadata,
        language: body.language,
      });

      const response: IngestAcceptedResponse = {
        status: "accepted",
        message: "Repository ingestion started",
        repository: { owner, repo, branch: body.branch },
        job_id: jobId,
      };
      res.status(202).json(response);
    } catch (error) {
      if (error instanceof InvalidInputError) {
        next(badRequest(error.message, "INVALID_REPOSITORY_URL"));
        return;
      }
      next(error);
    }
  });

  router.get("/ingest/jobs/:jobId", (req: Request, res: Response, next: NextFunction): void => {
    const jobId = req.params["jobId"] ?? "";
    const job = deps.jobTracker.getJobResponse(jobId);

    if (!job) {
      next(notFound(`Job not found: ${jobId}`, "JOB_NOT_FOUND"));
      return;
    }

    res.status(200).json(job);
  });

  return router;
}
