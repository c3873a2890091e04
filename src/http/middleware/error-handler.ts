/**
 * Error Handler Middleware
 *
 * Turns errors passed to `next()` into JSON responses. Details of
 * unexpected errors are logged, never sent to the client.
 */

import type { Request, Response, NextFunction } from "express";
import { getComponentLogger } from "../../logging/index.js";
import { REQUEST_ID_HEADER } from "./request-logging.js";

let logger: ReturnType<typeof getComponentLogger> | null = null;

function getLogger(): ReturnType<typeof getComponentLogger> {
  if (!logger) {
    logger = getComponentLogger("http:error");
  }
  return logger;
}

/**
 * HTTP error with status code
 */
export class HttpError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export function badRequest(message: string, code?: string): HttpError {
  return new HttpError(400, message, code);
}

export function notFound(message: string, code?: string): HttpError {
  return new HttpError(404, message, code);
}

export function internalError(message: string, code?: string): HttpError {
  return new HttpError(500, message, code);
}

/**
 * Error response body
 */
export interface ErrorResponse {
  error: {
    message: string;
    code?: string;
    statusCode: number;
  };
}

/**
 * JSON parse failures from express.json() carry the raw body
 */
function isJsonParseError(err: Error): boolean {
  return err instanceof SyntaxError && "body" in err;
}

/**
 * Express error handling middleware
 *
 * Must declare four parameters for Express to treat it as error middleware.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction
): void {
  const requestId = req.get(REQUEST_ID_HEADER);

  let statusCode: number;
  let code: string | undefined;
  let message: string;

  if (err instanceof HttpError) {
    statusCode = err.statusCode;
    code = err.code;
    message = statusCode >= 500 ? "Internal server error" : err.message;
  } else if (isJsonParseError(err)) {
    statusCode = 400;
    code = "INVALID_JSON";
    message = "Invalid JSON in request body";
  } else {
    statusCode = 500;
    code = "INTERNAL_ERROR";
    message = "Internal server error";
  }

  const logData = { requestId, err, method: req.method, path: req.path, statusCode };
  if (statusCode >= 500) {
    getLogger().error(logData, `Request failed: ${err.message}`);
  } else {
    getLogger().warn(logData, `Request rejected: ${err.message}`);
  }

  const response: ErrorResponse = {
    error: {
      message,
      code,
      statusCode,
    },
  };

  res.status(statusCode).json(response);
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  const response: ErrorResponse = {
    error: {
      message: `Route not found: ${req.method} ${req.path}`,
      code: "NOT_FOUND",
      statusCode: 404,
    },
  };

  res.status(404).json(response);
}
