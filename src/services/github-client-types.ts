/**
 * Type definitions for the GitHub API client
 *
 * The client is the source-host collaborator of the ingestion pipeline: it
 * looks up repositories, lists directory contents and fetches file blobs
 * through the REST contents API.
 */

/**
 * Repository summary returned by the repository lookup
 */
export interface RepositoryInfo {
  /** "owner/repo" as reported by GitHub */
  fullName: string;
  /** Default branch name */
  defaultBranch: string;
  /** Whether the repository is private */
  isPrivate: boolean;
}

/**
 * Entry kinds returned by the contents API
 */
export type ContentEntryType = "file" | "dir" | "symlink" | "submodule";

/**
 * One entry of a directory listing
 */
export interface ContentEntry {
  /** Entry kind */
  type: ContentEntryType;
  /** Base name */
  name: string;
  /** Repository-relative path */
  path: string;
  /** Git blob or tree SHA */
  sha: string;
  /** Size in bytes (0 for directories) */
  size: number;
}

/**
 * File content as returned by the contents API
 */
export interface FileContent {
  /** Repository-relative path */
  path: string;
  /** Git blob SHA */
  sha: string;
  /** Size in bytes */
  size: number;
  /** Transport encoding of `content` ("base64", or "none" for large blobs) */
  encoding: string;
  /** Encoded content */
  content: string;
}

/**
 * Configuration for the GitHub client
 */
export interface GitHubClientConfig {
  /** GitHub Personal Access Token for authentication */
  token?: string;
  /** Base URL for GitHub API (default: https://api.github.com) */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
}

/**
 * GitHub client interface consumed by the content fetcher
 */
export interface GitHubClient {
  /**
   * Look up a repository
   *
   * @throws GitHubNotFoundError if the repository does not exist or is not visible
   * @throws GitHubAuthenticationError if authentication fails
   * @throws GitHubRateLimitError if rate limit exceeded
   */
  getRepository(owner: string, repo: string): Promise<RepositoryInfo>;

  /**
   * List a directory at a ref ("" for the repository root)
   *
   * @throws GitHubNotFoundError if the path or ref does not exist
   * @throws GitHubAPIError if the path is not a directory
   */
  listDirectory(owner: string, repo: string, path: string, ref: string): Promise<ContentEntry[]>;

  /**
   * Fetch a single file's encoded content at a ref
   *
   * @throws GitHubNotFoundError if the file or ref does not exist
   * @throws GitHubAPIError if the path is not a file
   */
  getFileContent(owner: string, repo: string, path: string, ref: string): Promise<FileContent>;

  /**
   * Check if the GitHub API is accessible and authenticated
   */
  healthCheck(): Promise<boolean>;
}
