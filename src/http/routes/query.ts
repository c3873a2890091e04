/**
 * Query Route
 *
 * POST /query runs a semantic search over ingested repositories.
 */

import { Router } from "express";
import type { Request, Response } from "express";
import { z } from "zod";
import { InvalidInputError } from "../../ingestion/index.js";
import { SearchValidationError, type SearchService } from "../../services/index.js";
import { getComponentLogger } from "../../logging/index.js";
import type { QueryResponse } from "../types.js";

let logger: ReturnType<typeof getComponentLogger> | null = null;

function getLogger(): ReturnType<typeof getComponentLogger> {
  if (!logger) {
    logger = getComponentLogger("http:query");
  }
  return logger;
}

/**
 * POST /query body; bounds are enforced by the search service
 */
export const QueryRequestSchema = z
  .object({
    query: z.string({
      required_error: "query is required",
      invalid_type_error: "query must be a string",
    }),
    namespace: z.string().optional(),
    repo_url: z.string().optional(),
    limit: z.number().optional(),
  })
  .strict();

export interface QueryRouteDependencies {
  searchService: SearchService;
}

function errorResponse(res: Response, statusCode: number, message: string): void {
  const response: QueryResponse = { status: "error", results: [], message };
  res.status(statusCode).json(response);
}

/**
 * Create query router
 */
export function createQueryRouter(deps: QueryRouteDependencies): Router {
  const router = Router();

  router.post("/query", async (req: Request, res: Response): Promise<void> => {
    const parsed = QueryRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const message = parsed.error.issues
        .map((issue) =>
          issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
        )
        .join("; ");
      errorResponse(res, 400, message);
      return;
    }

    try {
      const { results } = await deps.searchService.search({
        query: parsed.data.query,
        namespace: parsed.data.namespace,
        repoUrl: parsed.data.repo_url,
        limit: parsed.data.limit,
      });

      const response: QueryResponse = {
        status: "success",
        results,
        message: `Found ${results.length} result(s)`,
      };
      res.status(200).json(response);
    } catch (error) {
      if (error instanceof SearchValidationError || error instanceof InvalidInputError) {
        errorResponse(res, 400, error.message);
        return;
      }

      getLogger().error({ err: error }, "Query failed");
      errorResponse(res, 500, "Query failed");
    }
  });

  return router;
}
