/**
 * Validation schemas for the GitHub client
 *
 * Zod schemas for request parameters, client configuration and the parts
 * of GitHub API responses the client reads.
 */

import { z } from "zod";

const GITHUB_OWNER_MAX_LENGTH = 39;
const GITHUB_REPO_MAX_LENGTH = 100;
const GIT_REF_MAX_LENGTH = 255;
const TIMEOUT_MIN_MS = 1000;
const TIMEOUT_MAX_MS = 300000;
const TIMEOUT_DEFAULT_MS = 30000;
const MAX_RETRIES_LIMIT = 10;
const MAX_RETRIES_DEFAULT = 3;

/**
 * GitHub username/organization name
 *
 * 1-39 characters, alphanumeric or single hyphens, no leading or trailing hyphen.
 */
export const GitHubOwnerSchema = z
  .string()
  .min(1, "Owner is required")
  .max(GITHUB_OWNER_MAX_LENGTH, `Owner must be at most ${GITHUB_OWNER_MAX_LENGTH} characters`)
  .regex(
    /^[a-zA-Z0-9](?:[a-zA-Z0-9]|-(?=[a-zA-Z0-9])){0,38}$/,
    "Invalid GitHub username or organization name"
  );

/**
 * GitHub repository name: 1-100 of alphanumeric, hyphen, underscore, period
 */
export const GitHubRepoSchema = z
  .string()
  .min(1, "Repository name is required")
  .max(
    GITHUB_REPO_MAX_LENGTH,
    `Repository name must be at most ${GITHUB_REPO_MAX_LENGTH} characters`
  )
  .regex(/^[\w.-]+$/, "Invalid repository name");

/**
 * Git ref (branch, tag or SHA)
 */
export const GitRefSchema = z
  .string()
  .min(1, "Git reference is required")
  .max(GIT_REF_MAX_LENGTH, `Git reference must be at most ${GIT_REF_MAX_LENGTH} characters`);

/**
 * Repository-relative path; "" addresses the root
 */
export const ContentPathSchema = z
  .string()
  .refine((path) => !path.startsWith("/"), "Path must be relative to the repository root")
  .refine((path) => !path.split("/").includes(".."), "Path must not contain '..' segments");

export const OwnerRepoSchema = z.object({
  owner: GitHubOwnerSchema,
  repo: GitHubRepoSchema,
});

export const ContentRequestSchema = OwnerRepoSchema.extend({
  path: ContentPathSchema,
  ref: GitRefSchema,
});

/**
 * Schema for GitHub client configuration
 */
export const GitHubClientConfigSchema = z.object({
  token: z.string().optional(),
  baseUrl: z.string().url("Invalid base URL").optional().default("https://api.github.com"),
  timeoutMs: z
    .number()
    .int()
    .min(TIMEOUT_MIN_MS, `Timeout must be at least ${TIMEOUT_MIN_MS}ms`)
    .max(TIMEOUT_MAX_MS, `Timeout must be at most ${TIMEOUT_MAX_MS}ms`)
    .optional()
    .default(TIMEOUT_DEFAULT_MS),
  maxRetries: z
    .number()
    .int()
    .min(0, "Max retries must be non-negative")
    .max(MAX_RETRIES_LIMIT, `Max retries must be at most ${MAX_RETRIES_LIMIT}`)
    .optional()
    .default(MAX_RETRIES_DEFAULT),
});

/**
 * GET /repos/{owner}/{repo}
 */
export const RepositoryResponseSchema = z.object({
  full_name: z.string(),
  default_branch: z.string(),
  private: z.boolean(),
});

const ContentEntryResponseSchema = z.object({
  type: z.enum(["file", "dir", "symlink", "submodule"]),
  name: z.string(),
  path: z.string(),
  sha: z.string(),
  size: z.number().int().nonnegative(),
});

/**
 * GET /repos/{owner}/{repo}/contents/{dir}
 */
export const DirectoryListingResponseSchema = z.array(ContentEntryResponseSchema);

/**
 * GET /repos/{owner}/{repo}/contents/{file}
 */
export const FileContentResponseSchema = z.object({
  type: z.literal("file"),
  path: z.string(),
  sha: z.string(),
  size: z.number().int().nonnegative(),
  encoding: z.string(),
  content: z.string(),
});

export type ValidatedContentRequest = z.infer<typeof ContentRequestSchema>;
export type ValidatedOwnerRepo = z.infer<typeof OwnerRepoSchema>;
export type ValidatedGitHubClientConfig = z.infer<typeof GitHubClientConfigSchema>;
