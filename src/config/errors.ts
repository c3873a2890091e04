/**
 * Configuration errors
 *
 * @module config/errors
 */

/**
 * Thrown when required configuration is missing or malformed at startup
 *
 * Fatal: the process must not start serving with an incomplete configuration.
 */
export class ConfigurationError extends Error {
  public readonly code = "CONFIGURATION_ERROR" as const;
  public readonly retryable = false;

  /**
   * Environment variables that were absent or blank
   */
  public readonly missingKeys: string[];

  /**
   * Human-readable problems with values that were present
   */
  public readonly invalidValues: string[];

  constructor(message: string, missingKeys: string[] = [], invalidValues: string[] = []) {
    super(message);
    this.name = "ConfigurationError";
    this.missingKeys = missingKeys;
    this.invalidValues = invalidValues;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}
