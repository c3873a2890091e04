/**
 * Logging Module - Public API
 *
 * Structured logging on Pino with secret redaction and component context.
 *
 * ```typescript
 * initializeLogger({ level: "info", format: "pretty" });
 *
 * const logger = getComponentLogger("http:server");
 * logger.info({ port }, "HTTP server listening");
 * ```
 *
 * Environment variables (read by config/loadLoggerConfig):
 * - `LOG_LEVEL`: silent|fatal|error|warn|info|debug|trace, default info
 * - `LOG_FORMAT`: json|pretty, default pretty
 *
 * @module logging
 */

export * from "./types.js";

export {
  initializeLogger,
  getComponentLogger,
  getRootLogger,
  resetLogger,
} from "./logger-factory.js";

export { REDACT_PATHS, REDACT_OPTIONS } from "./redactors.js";
