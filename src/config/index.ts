/**
 * Configuration module exports
 */

export {
  loadAppConfig,
  loadLoggerConfig,
  REQUIRED_ENV_KEYS,
  type AppConfig,
} from "./app-config.js";
export { ConfigurationError } from "./errors.js";
