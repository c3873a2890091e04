/**
 * Health Check Route
 *
 * Liveness only: answers 200 whenever the process is serving requests.
 */

import { Router } from "express";
import type { Request, Response } from "express";
import type { HealthResponse } from "../types.js";

export const SERVICE_NAME = "repo-vector-ingest API";
export const SERVICE_VERSION = "1.0.0";

/**
 * Create health check router
 */
export function createHealthRouter(): Router {
  const router = Router();

  /**
   * GET /health
   */
  router.get("/health", (_req: Request, res: Response): void => {
    const response: HealthResponse = {
      status: "healthy",
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      version: SERVICE_VERSION,
    };

    res.status(200).json(response);
  });

  return router;
}
