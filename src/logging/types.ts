/**
 * Logging Types and Interfaces
 *
 * @module logging/types
 */

/**
 * Supported log levels, most to least severe after `silent`
 */
export const LOG_LEVELS = ["silent", "fatal", "error", "warn", "info", "debug", "trace"] as const;

/**
 * Log level accepted by the logger
 *
 * `silent` suppresses all output and is mostly used in tests.
 */
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Output formats
 * - json: structured output for production and log aggregation
 * - pretty: colorized output for development
 */
export const LOG_FORMATS = ["json", "pretty"] as const;

export type LogFormat = (typeof LOG_FORMATS)[number];

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output
   * @default "info"
   */
  level: LogLevel;

  /**
   * Log output format
   * @default "pretty"
   */
  format: LogFormat;

  /**
   * Custom output stream, used by tests to capture log lines
   * @internal
   */
  stream?: NodeJS.WritableStream;
}

/**
 * Context bound to every entry of a component logger
 */
export interface ComponentContext {
  /**
   * Component name, colon-separated for hierarchy
   * (e.g. "storage:chromadb", "http:ingest", "ingestion:content-fetcher")
   */
  component: string;

  /**
   * Optional request/correlation ID for tracing
   */
  requestId?: string;
}
