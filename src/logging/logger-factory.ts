/**
 * Logger Factory
 *
 * Core logging infrastructure built on Pino. Handles root logger creation
 * and component-scoped child loggers.
 *
 * - Writes to stderr
 * - Redacts secrets by path
 * - JSON output for production, pino-pretty for development
 *
 * @module logging/logger-factory
 */

import pino from "pino";
import type { LoggerConfig, ComponentContext } from "./types.js";
import { REDACT_OPTIONS } from "./redactors.js";

/**
 * Singleton root logger, set once at startup
 */
let rootLogger: pino.Logger | null = null;

/**
 * Shared options for every root logger variant
 */
function baseOptions(config: LoggerConfig): pino.LoggerOptions {
  return {
    level: config.level,
    redact: REDACT_OPTIONS,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
}

/**
 * Create the root Pino logger
 *
 * @internal
 */
function createRootLogger(config: LoggerConfig): pino.Logger {
  const options = baseOptions(config);

  // Test streams bypass transports entirely
  if (config.stream) {
    return pino(options, config.stream);
  }

  if (config.format === "pretty") {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          singleLine: false,
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

/**
 * Initialize the global logger
 *
 * Must be called once at application startup before any logging occurs.
 *
 * @throws Error if logger is already initialized
 *
 * @example
 * ```typescript
 * initializeLogger(loadLoggerConfig());
 * ```
 */
export function initializeLogger(config: LoggerConfig): void {
  if (rootLogger !== null) {
    throw new Error("Logger already initialized. initializeLogger() should only be called once.");
  }

  try {
    rootLogger = createRootLogger(config);
    rootLogger.debug({ level: config.level, format: config.format }, "Logger initialized");
  } catch (error) {
    // pino-pretty may be missing in slim production installs
    rootLogger = pino(baseOptions({ level: config.level, format: "json" }), pino.destination(2));

    rootLogger.warn(
      {
        requestedFormat: config.format,
        fallbackFormat: "json",
        error: error instanceof Error ? error.message : String(error),
      },
      "Logger initialization failed, using fallback JSON logger"
    );
  }
}

/**
 * Get the root logger instance
 *
 * @throws Error if logger not initialized
 *
 * @internal - Most code should use getComponentLogger() instead
 */
export function getRootLogger(): pino.Logger {
  if (rootLogger === null) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return rootLogger;
}

/**
 * Get a component-scoped logger
 *
 * Every entry from the returned child carries `component` and, when given,
 * `requestId`. Use colon notation for hierarchy (`storage:chromadb`).
 *
 * @example
 * ```typescript
 * const logger = getComponentLogger("ingestion:content-fetcher");
 * logger.info({ owner, repo }, "Fetching repository contents");
 * ```
 */
export function getComponentLogger(component: string, requestId?: string): pino.Logger {
  const root = getRootLogger();

  const context: ComponentContext = {
    component,
    ...(requestId && { requestId }),
  };

  return root.child(context);
}

/**
 * Reset logger (tests only)
 *
 * @internal
 */
export function resetLogger(): void {
  rootLogger = null;
}
