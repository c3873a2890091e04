/**
 * Mock helper for the GitHub REST API
 *
 * Replaces global fetch with a router over an in-memory repository tree,
 * so the GitHub client and content fetcher can be tested without network
 * access. Requests to any other origin pass through to the real fetch.
 * Tracks every GitHub request for verification in tests.
 *
 * @module tests/helpers/github-api-mock
 */

import { vi } from "vitest";

/**
 * File stored in a mock repository
 */
export interface MockFile {
  /** UTF-8 text, base64-encoded on the wire unless `rawContent` is set */
  content?: string;
  /** Sent verbatim as the `content` field */
  rawContent?: string;
  /** @default "base64" */
  encoding?: string;
  /** @default `sha-${path}` */
  sha?: string;
}

/**
 * Call log entry for tracking API calls
 */
export interface GitHubAPICallLog {
  url: string;
  pathname: string;
  ref: string | null;
  headers: Headers;
}

/**
 * Injected failure for a request path
 */
export interface MockFailure {
  status: number;
  message: string;
  headers?: Record<string, string>;
  /** Number of requests to fail; unlimited when omitted */
  times?: number;
}

interface MockRepository {
  defaultBranch: string;
  branches: Set<string>;
  files: Map<string, MockFile>;
}

const API_ORIGIN = "https://api.github.com";

function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

/**
 * Mock GitHub API for testing
 *
 * @example
 * ```typescript
 * const api = new MockGitHubAPI();
 * api.addRepository("acme", "widgets", { "src/a.py": "print(1)" });
 * api.install();
 * // ... exercise GitHubClientImpl
 * api.uninstall();
 * ```
 */
export class MockGitHubAPI {
  private readonly repositories = new Map<string, MockRepository>();
  private readonly failures = new Map<string, MockFailure>();
  private callLog: GitHubAPICallLog[] = [];
  private readonly passthroughFetch: typeof fetch = globalThis.fetch;

  /**
   * Register a repository and its files
   */
  addRepository(
    owner: string,
    repo: string,
    files: Record<string, string | MockFile>,
    options: { defaultBranch?: string; branches?: string[] } = {}
  ): void {
    const defaultBranch = options.defaultBranch ?? "main";
    const entries = Object.entries(files).map(([path, file]): [string, MockFile] => [
      path,
      typeof file === "string" ? { content: file } : file,
    ]);
    this.repositories.set(`${owner}/${repo}`, {
      defaultBranch,
      branches: new Set([defaultBranch, ...(options.branches ?? [])]),
      files: new Map(entries),
    });
  }

  /**
   * Fail requests whose URL pathname equals `pathname`
   */
  failPath(pathname: string, failure: MockFailure): void {
    this.failures.set(pathname, failure);
  }

  /**
   * Install the mock by replacing global fetch
   */
  install(): void {
    vi.stubGlobal("fetch", this.handleFetch);
  }

  /**
   * Uninstall the mock and restore original fetch
   */
  uninstall(): void {
    vi.unstubAllGlobals();
  }

  reset(): void {
    this.repositories.clear();
    this.failures.clear();
    this.callLog = [];
  }

  getCallLog(): GitHubAPICallLog[] {
    return [...this.callLog];
  }

  getCallCount(): number {
    return this.callLog.length;
  }

  private readonly handleFetch = async (
    input: string | URL | Request,
    init?: RequestInit
  ): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : input.toString());

    // Requests to other hosts (a local test server) go through untouched
    if (url.origin !== API_ORIGIN) {
      return this.passthroughFetch(input, init);
    }

    this.callLog.push({
      url: url.toString(),
      pathname: url.pathname,
      ref: url.searchParams.get("ref"),
      headers: new Headers(init?.headers),
    });

    const failure = this.failures.get(url.pathname);
    if (failure) {
      if (failure.times !== undefined) {
        failure.times--;
        if (failure.times <= 0) {
          this.failures.delete(url.pathname);
        }
      }
      return jsonResponse(failure.status, { message: failure.message }, failure.headers);
    }

    if (url.pathname === "/rate_limit") {
      return jsonResponse(200, { resources: { core: { limit: 5000, remaining: 4999 } } });
    }

    const match = /^\/repos\/([^/]+)\/([^/]+)(?:\/contents(\/.*)?)?$/.exec(url.pathname);
    const owner = match?.[1];
    const repoName = match?.[2];
    if (!owner || !repoName) {
      return jsonResponse(404, { message: "Not Found" });
    }

    const repository = this.repositories.get(`${owner}/${repoName}`);
    if (!repository) {
      return jsonResponse(404, { message: "Not Found" });
    }

    if (!url.pathname.includes("/contents")) {
      return jsonResponse(200, {
        full_name: `${owner}/${repoName}`,
        default_branch: repository.defaultBranch,
        private: false,
      });
    }

    const ref = url.searchParams.get("ref") ?? repository.defaultBranch;
    if (!repository.branches.has(ref)) {
      return jsonResponse(404, { message: `No commit found for the ref ${ref}` });
    }

    const contentPath = (match?.[3] ?? "")
      .split("/")
      .filter((segment) => segment.length > 0)
      .map((segment) => decodeURIComponent(segment))
      .join("/");

    return this.contentsResponse(repository, contentPath);
  };

  private contentsResponse(repository: MockRepository, path: string): Response {
    const file = repository.files.get(path);
    if (file) {
      return jsonResponse(200, {
        type: "file",
        path,
        sha: file.sha ?? `sha-${path}`,
        size: file.content?.length ?? 0,
        encoding: file.encoding ?? "base64",
        content: file.rawContent ?? Buffer.from(file.content ?? "", "utf-8").toString("base64"),
      });
    }

    const prefix = path === "" ? "" : `${path}/`;
    const entries = new Map<string, Record<string, unknown>>();

    for (const [filePath, entry] of repository.files) {
      if (!filePath.startsWith(prefix)) {
        continue;
      }
      const remainder = filePath.slice(prefix.length);
      const slash = remainder.indexOf("/");
      if (slash === -1) {
        entries.set(remainder, {
          type: "file",
          name: remainder,
          path: filePath,
          sha: entry.sha ?? `sha-${filePath}`,
          size: entry.content?.length ?? 0,
        });
      } else {
        const name = remainder.slice(0, slash);
        entries.set(name, {
          type: "dir",
          name,
          path: `${prefix}${name}`,
          sha: `tree-${prefix}${name}`,
          size: 0,
        });
      }
    }

    if (entries.size === 0 && path !== "") {
      return jsonResponse(404, { message: "Not Found" });
    }

    return jsonResponse(200, [...entries.values()]);
  }
}
