/**
 * HTTP API Module
 *
 * Express app exposing health, ingestion and query endpoints.
 */

export { createHttpApp, startHttpServer, type HttpServerDependencies } from "./server.js";

export type {
  HttpServerConfig,
  HttpServerInstance,
  HealthResponse,
  IngestAcceptedResponse,
  QueryResponse,
} from "./types.js";

export {
  createHealthRouter,
  createIngestRouter,
  createQueryRouter,
  IngestRequestSchema,
  QueryRequestSchema,
  SERVICE_NAME,
  SERVICE_VERSION,
  type IngestRouteDependencies,
  type QueryRouteDependencies,
} from "./routes/index.js";

export {
  requestLogging,
  errorHandler,
  notFoundHandler,
  HttpError,
  badRequest,
  notFound,
  internalError,
} from "./middleware/index.js";
