/**
 * Service layer exports
 */

export { GitHubClientImpl } from "./github-client.js";
export type {
  GitHubClient,
  GitHubClientConfig,
  RepositoryInfo,
  ContentEntry,
  ContentEntryType,
  FileContent,
} from "./github-client-types.js";
export {
  GitHubClientError,
  GitHubAuthenticationError,
  GitHubRateLimitError,
  GitHubNotFoundError,
  GitHubNetworkError,
  GitHubAPIError,
  GitHubValidationError,
  describeTarget,
  isRetryableGitHubError,
} from "./github-client-errors.js";
export type { GitHubErrorCode, GitHubRequestTarget } from "./github-client-errors.js";

export { DocumentIndexer } from "./document-indexer.js";
export type { IndexResult } from "./document-indexer.js";
export { IngestionService } from "./ingestion-service.js";
export type { DocumentFetcher, IndexingCollaborator } from "./ingestion-service.js";
export { IngestionQueue } from "./ingestion-queue.js";
export type { IngestionQueueConfig, IngestionRunner } from "./ingestion-queue.js";
export { JobTracker } from "./job-tracker.js";
export type { JobTrackerConfig } from "./job-tracker.js";
export type {
  IngestionRequest,
  IngestionResult,
  IngestionStatus,
  IngestionJob,
  JobStatus,
  JobResponse,
} from "./ingestion-types.js";

export { SearchServiceImpl } from "./search-service.js";
export type { SearchService, SearchQuery, SearchResult, SearchResponse } from "./types.js";
export { SearchQuerySchema } from "./validation.js";
export { SearchError, SearchValidationError } from "./errors.js";
