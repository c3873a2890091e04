/**
 * Request Logging Middleware
 *
 * Tags each request with an id and logs its completion with timing.
 */

import { randomBytes } from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import { getComponentLogger } from "../../logging/index.js";

/**
 * Header carrying the request id, on both the request and the response
 */
export const REQUEST_ID_HEADER = "x-request-id";

let logger: ReturnType<typeof getComponentLogger> | null = null;

function getLogger(): ReturnType<typeof getComponentLogger> {
  if (!logger) {
    logger = getComponentLogger("http:request");
  }
  return logger;
}

/**
 * Request logging middleware
 *
 * Request bodies are never logged.
 */
export function requestLogging(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  const requestId = generateRequestId();

  req.headers[REQUEST_ID_HEADER] = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);

  getLogger().debug(
    {
      requestId,
      method: req.method,
      path: req.path,
      userAgent: req.get("User-Agent"),
      contentType: req.get("Content-Type"),
    },
    "Incoming request"
  );

  res.on("finish", () => {
    const logData = {
      requestId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: Date.now() - startTime,
    };

    if (res.statusCode >= 500) {
      getLogger().error(logData, "Request completed with server error");
    } else if (res.statusCode >= 400) {
      getLogger().warn(logData, "Request completed with client error");
    } else {
      getLogger().info(logData, "Request completed");
    }
  });

  next();
}

function generateRequestId(): string {
  return `req_${Date.now().toString(36)}_${randomBytes(4).toString("hex")}`;
}
