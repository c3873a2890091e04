/**
 * HTTP Routes Exports
 */

export { createHealthRouter, SERVICE_NAME, SERVICE_VERSION } from "./health.js";
export { createIngestRouter, IngestRequestSchema } from "./ingest.js";
export type { IngestRouteDependencies, IngestRequestBody } from "./ingest.js";
export { createQueryRouter, QueryRequestSchema } from "./query.js";
export type { QueryRouteDependencies } from "./query.js";
