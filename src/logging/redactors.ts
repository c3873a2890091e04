/**
 * Secret Redaction Configuration
 *
 * Pino redaction paths for tokens and keys that may end up in log objects.
 *
 * @module logging/redactors
 */

/**
 * Paths replaced with [REDACTED] on every log entry
 *
 * Pino path syntax: dot notation for nesting, `*` for any single level.
 */
export const REDACT_PATHS = [
  // Environment variables
  "env.GITHUB_PAT",
  "env.OPENAI_API_KEY",
  "env.CHROMADB_AUTH_TOKEN",

  // HTTP headers
  "headers.authorization",
  "headers.Authorization",
  "req.headers.authorization",
  "res.headers.authorization",

  // Common secret field names
  "*.apiKey",
  "*.api_key",
  "*.authToken",
  "*.password",
  "*.token",
  "*.secret",
  "*.pat",
  "*.accessToken",
  "*.access_token",
  "*.credentials",
];

/**
 * Pino redaction options
 *
 * See: https://getpino.io/#/docs/redaction
 */
export const REDACT_OPTIONS = {
  paths: REDACT_PATHS,
  censor: "[REDACTED]",
  remove: false,
};
