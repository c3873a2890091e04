/**
 * Per-path ingestion decisions.
 *
 * @module ingestion/file-filter
 */

import type pino from "pino";
import { getComponentLogger } from "../logging/index.js";
import { COMMON_EXTENSIONS, IGNORED_DIRECTORIES, LANGUAGE_EXTENSIONS } from "./file-policy.js";

/**
 * Final `.suffix` of the last path segment.
 *
 * Returns "" for names without a dot, dotfiles such as `.bashrc`, and names
 * ending in a dot.
 *
 * @example getFileExtension("src/types.d.ts") // ".ts"
 */
export function getFileExtension(path: string): string {
  const segments = path.split("/");
  const name = segments[segments.length - 1] ?? "";
  const dotIndex = name.lastIndexOf(".");

  if (dotIndex <= 0 || dotIndex === name.length - 1) {
    return "";
  }

  return name.slice(dotIndex);
}

/**
 * Decides which repository files are fetched.
 *
 * The language selector is fixed at construction:
 * - none: common extensions plus every language table
 * - known (case-insensitive): common extensions plus that language
 * - unknown: common extensions only, with a warning
 *
 * @example
 * ```typescript
 * const filter = new FileFilter("python");
 * filter.shouldFetch("src/app.py");            // true
 * filter.shouldFetch(".github/workflows/a.py"); // false
 * ```
 */
export class FileFilter {
  readonly language: string | undefined;
  private readonly allowedExtensions: ReadonlySet<string>;
  private _logger: pino.Logger | null = null;

  constructor(language?: string) {
    this.language = language;
    this.allowedExtensions = this.resolveAllowedExtensions(language);
  }

  private get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("ingestion:file-filter");
    }
    return this._logger;
  }

  /**
   * Extensions accepted by this filter
   */
  getAllowedExtensions(): ReadonlySet<string> {
    return this.allowedExtensions;
  }

  /**
   * Whether any segment of the path is an ignored directory name
   */
  isIgnoredDirectory(path: string): boolean {
    return path.split("/").some((segment) => IGNORED_DIRECTORIES.has(segment));
  }

  /**
   * Whether a file should be fetched and ingested
   *
   * @param path - Repository-relative path using `/` separators
   */
  shouldFetch(path: string): boolean {
    if (this.isIgnoredDirectory(path)) {
      return false;
    }

    return this.allowedExtensions.has(getFileExtension(path));
  }

  private resolveAllowedExtensions(language: string | undefined): ReadonlySet<string> {
    if (language === undefined) {
      const all = new Set(COMMON_EXTENSIONS);
      for (const extensions of LANGUAGE_EXTENSIONS.values()) {
        extensions.forEach((extension) => all.add(extension));
      }
      return all;
    }

    const languageExtensions = LANGUAGE_EXTENSIONS.get(language.toLowerCase());
    if (!languageExtensions) {
      this.logger.warn(
        { language },
        "Unknown language selector, defaulting to common extensions only"
      );
      return COMMON_EXTENSIONS;
    }

    return new Set([...COMMON_EXTENSIONS, ...languageExtensions]);
  }
}
