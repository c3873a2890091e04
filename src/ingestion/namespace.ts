/**
 * Storage namespace derivation.
 *
 * @module ingestion/namespace
 */

/**
 * Namespace for a repository's vectors within the shared collection.
 *
 * Case- and dash-insensitive: `("Test-Owner", "Test-Repo")` and
 * `("test_owner", "test_repo")` both give `github_test_owner_test_repo`.
 */
export function buildNamespace(owner: string, repo: string): string {
  return `github_${owner}_${repo}`.toLowerCase().replaceAll("-", "_");
}
