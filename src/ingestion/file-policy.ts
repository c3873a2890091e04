/**
 * File selection policy for repository ingestion.
 *
 * Static tables consulted by FileFilter, built once at module load. The sets
 * and maps are exposed through read-only types; only the language list is
 * frozen at run time.
 *
 * @module ingestion/file-policy
 */

/**
 * Directory names whose contents are never ingested.
 *
 * Matched against whole path segments (CI configuration, editor settings,
 * package-manager caches).
 */
export const IGNORED_DIRECTORIES: ReadonlySet<string> = new Set([
  ".github",
  ".circleci",
  ".gitlab",
  ".azure",
  "workflows",
  "node_modules",
  "CONTRIBUTING",
  ".vscode",
  ".idea",
  ".yarn",
]);

/**
 * Documentation and configuration extensions, always allowed.
 */
export const COMMON_EXTENSIONS: ReadonlySet<string> = new Set([
  ".md",
  ".mdx",
  ".rst",
  ".txt",
  ".json",
  ".yaml",
  ".yml",
  ".ini",
  ".toml",
]);

/**
 * Source extensions per language selector.
 *
 * `.d.ts` is listed for completeness; extension matching uses the final
 * suffix, so declaration files match through `.ts`.
 */
export const LANGUAGE_EXTENSIONS: ReadonlyMap<string, ReadonlySet<string>> = new Map<
  string,
  ReadonlySet<string>
>([
  ["python", new Set([".py", ".pyi", ".pyx", ".ipynb"])],
  ["typescript", new Set([".ts", ".tsx", ".d.ts"])],
  ["javascript", new Set([".js", ".jsx", ".mjs"])],
  ["java", new Set([".java", ".jar"])],
  ["go", new Set([".go"])],
  ["rust", new Set([".rs"])],
  ["c", new Set([".c", ".h"])],
  ["cpp", new Set([".cpp", ".hpp", ".cc", ".hh"])],
]);

/**
 * Language selectors with an extension table.
 */
export const SUPPORTED_LANGUAGES: readonly string[] = Object.freeze([...LANGUAGE_EXTENSIONS.keys()]);
