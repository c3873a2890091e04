/**
 * GitHub repository URL parsing
 *
 * Turns `http(s)://github.com/{owner}/{repo}` URLs into a repository
 * reference. Pure string handling; never touches the network.
 *
 * @module utils/github-url-parser
 */

import { InvalidInputError } from "../ingestion/errors.js";
import type { RepositoryRef } from "../ingestion/types.js";

/**
 * Accepted URL shape: scheme, github.com host, owner and repo segments.
 * Anything after the repo segment is ignored.
 */
const GITHUB_REPOSITORY_URL_PATTERN = /^https?:\/\/github\.com\/[^/]+\/[^/]+\/?/;

const GIT_SUFFIX = ".git";

/**
 * Parse a GitHub repository URL into owner and repo
 *
 * @param url - Repository URL, e.g. `https://github.com/acme/widgets.git`
 * @returns Owner and repo, with any trailing `.git` removed from the repo
 * @throws {InvalidInputError} If the URL is not a GitHub repository URL
 *
 * @example
 * ```typescript
 * parseGitHubRepositoryUrl("https://github.com/acme/widgets/tree/main/src");
 * // { owner: "acme", repo: "widgets" }
 * ```
 */
export function parseGitHubRepositoryUrl(url: string): RepositoryRef {
  if (!GITHUB_REPOSITORY_URL_PATTERN.test(url)) {
    throw new InvalidInputError("Invalid GitHub repository URL format", "repo_url");
  }

  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch (error) {
    throw new InvalidInputError(
      "Invalid GitHub repository URL format",
      "repo_url",
      error instanceof Error ? error : undefined
    );
  }

  const [owner = "", rawRepo = ""] = pathname.replace(/^\/+|\/+$/g, "").split("/");
  const repo = rawRepo.endsWith(GIT_SUFFIX) ? rawRepo.slice(0, -GIT_SUFFIX.length) : rawRepo;

  if (owner === "" || repo === "") {
    throw new InvalidInputError(
      "GitHub repository URL must include both owner and repository",
      "repo_url"
    );
  }

  return { owner, repo };
}

