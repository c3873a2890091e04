/**
 * Shared utilities
 */

export {
  withRetry,
  createRetryLogger,
  defaultExponentialBackoff,
  toError,
  type RetryOptions,
} from "./retry.js";
export { parseGitHubRepositoryUrl } from "./github-url-parser.js";
