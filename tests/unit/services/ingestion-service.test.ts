/**
 * Unit tests for IngestionService
 *
 * The end-to-end cases wire the real pipeline against the GitHub API mock,
 * the OpenAI client mock and the in-memory Chroma binding.
 */

import { describe, test, expect, beforeAll, beforeEach, afterEach, vi } from "vitest";
import {
  IngestionService,
  type DocumentFetcher,
  type IndexingCollaborator,
} from "../../../src/services/ingestion-service.js";
import { DocumentIndexer } from "../../../src/services/document-indexer.js";
import { GitHubClientImpl } from "../../../src/services/github-client.js";
import { GitHubContentFetcher } from "../../../src/ingestion/content-fetcher.js";
import { DocumentChunker } from "../../../src/ingestion/document-chunker.js";
import { FileFilter } from "../../../src/ingestion/file-filter.js";
import { InvalidInputError, SourceFetchError } from "../../../src/ingestion/errors.js";
import { OpenAIEmbeddingProvider } from "../../../src/providers/openai-embedding.js";
import { EmbeddingRateLimitError } from "../../../src/providers/errors.js";
import { ChromaStorageClientImpl } from "../../../src/storage/chroma-client.js";
import { DocumentOperationError, StorageError } from "../../../src/storage/errors.js";
import { initializeLogger } from "../../../src/logging/index.js";
import type { Document } from "../../../src/ingestion/types.js";
import { MockGitHubAPI } from "../../helpers/github-api-mock.js";
import { MockChromaApi } from "../../helpers/chroma-mock.js";
import { MockOpenAIClient } from "../../helpers/openai-mock.js";
import {
  TEST_DIMENSIONS,
  createProviderConfig,
  createStorageConfig,
} from "../../fixtures/config-fixtures.js";

beforeAll(() => {
  initializeLogger({ level: "silent", format: "json" });
});

describe("IngestionService end to end", () => {
  let api: MockGitHubAPI;
  let chroma: MockChromaApi;
  let openai: MockOpenAIClient;
  let service: IngestionService;

  beforeEach(async () => {
    api = new MockGitHubAPI();
    api.install();
    chroma = new MockChromaApi();
    openai = new MockOpenAIClient(TEST_DIMENSIONS);

    const storage = new ChromaStorageClientImpl(createStorageConfig(), () => chroma);
    await storage.connect();

    const fetcher = new GitHubContentFetcher(
      new GitHubClientImpl({ token: "test-secret", maxRetries: 0 })
    );
    const indexer = new DocumentIndexer(
      new DocumentChunker(),
      new OpenAIEmbeddingProvider(createProviderConfig(), openai),
      storage
    );
    service = new IngestionService(fetcher, indexer);
  });

  afterEach(() => {
    api.uninstall();
  });

  test("ingests the single matching file with standard metadata", async () => {
    api.addRepository("acme", "widgets", {
      "a.py": "x",
      "b.png": "binary",
      ".github/workflows/ci.yml": "on: push",
    });

    const result = await service.ingest({
      repoUrl: "https://github.com/acme/widgets",
      branch: "main",
    });

    expect(result).toMatchObject({
      owner: "acme",
      repo: "widgets",
      branch: "main",
      namespace: "github_acme_widgets",
      status: "indexed",
      documentsFetched: 1,
      chunksStored: 1,
    });

    const collection = chroma.collection("github");
    expect(collection.upsertCalls).toBe(1);
    expect(collection.records.size).toBe(1);

    const record = collection.records.get("github_acme_widgets:sha-a.py:0");
    expect(record?.document).toBe("x");
    expect(record?.embedding).toHaveLength(TEST_DIMENSIONS);
    expect(record?.metadata).toMatchObject({
      owner: "acme",
      repo: "widgets",
      branch: "main",
      namespace: "github_acme_widgets",
      file_path: "a.py",
    });
  });

  test("completes without upserting when no file matches", async () => {
    api.addRepository("acme", "widgets", {
      "b.png": "binary",
      ".github/workflows/ci.yml": "on: push",
    });

    const result = await service.ingest({
      repoUrl: "https://github.com/acme/widgets",
      branch: "main",
    });

    expect(result).toMatchObject({
      status: "empty",
      documentsFetched: 0,
      chunksStored: 0,
      namespace: "github_acme_widgets",
    });
    expect(chroma.collection("github").upsertCalls).toBe(0);
    expect(openai.requests).toHaveLength(0);
  });

  test("caller metadata overrides standard fields", async () => {
    api.addRepository("acme", "widgets", { "a.py": "x" });

    await service.ingest({
      repoUrl: "https://github.com/acme/widgets",
      branch: "main",
      metadata: { owner: "override", team: "platform" },
    });

    const record = chroma.collection("github").records.get("github_acme_widgets:sha-a.py:0");
    expect(record?.metadata).toMatchObject({
      owner: "override",
      team: "platform",
      namespace: "github_acme_widgets",
    });
  });

  test("derives the namespace from the resolved URL", async () => {
    api.addRepository("Acme-Corp", "Big-Widgets", { "README.md": "# Widgets" });

    const result = await service.ingest({
      repoUrl: "https://github.com/Acme-Corp/Big-Widgets.git",
      branch: "main",
    });

    expect(result.namespace).toBe("github_acme_corp_big_widgets");
    expect(result.owner).toBe("Acme-Corp");
    expect(result.repo).toBe("Big-Widgets");
  });

  test("raises SourceFetchError for a missing repository", async () => {
    await expect(
      service.ingest({ repoUrl: "https://github.com/acme/missing", branch: "main" })
    ).rejects.toBeInstanceOf(SourceFetchError);
  });
});

describe("IngestionService with stub collaborators", () => {
  const sampleDocument: Document = { text: "x", metadata: {}, id: "sha", path: "a.py" };

  function createService(
    fetchDocuments: DocumentFetcher["fetchDocuments"],
    index: IndexingCollaborator["index"]
  ): IngestionService {
    return new IngestionService({ fetchDocuments }, { index });
  }

  test("rejects an invalid URL before fetching", async () => {
    const fetchDocuments = vi.fn<DocumentFetcher["fetchDocuments"]>();
    const service = createService(fetchDocuments, vi.fn());

    await expect(
      service.ingest({ repoUrl: "https://gitlab.com/acme/widgets", branch: "main" })
    ).rejects.toBeInstanceOf(InvalidInputError);
    expect(fetchDocuments).not.toHaveBeenCalled();
  });

  test("passes the language selector to the file filter", async () => {
    const fetchDocuments = vi.fn<DocumentFetcher["fetchDocuments"]>().mockResolvedValue([]);
    const service = createService(fetchDocuments, vi.fn());

    await service.ingest({
      repoUrl: "https://github.com/acme/widgets",
      branch: "dev",
      language: "go",
    });

    const call = fetchDocuments.mock.calls[0];
    expect(call?.slice(0, 3)).toEqual(["acme", "widgets", "dev"]);
    const filter = call?.[3];
    expect(filter).toBeInstanceOf(FileFilter);
    expect(filter?.language).toBe("go");
  });

  test("wraps embedding failures in StorageError", async () => {
    const service = createService(
      vi.fn<DocumentFetcher["fetchDocuments"]>().mockResolvedValue([sampleDocument]),
      vi
        .fn<IndexingCollaborator["index"]>()
        .mockRejectedValue(new EmbeddingRateLimitError("Rate limit exceeded"))
    );

    const error = await service
      .ingest({ repoUrl: "https://github.com/acme/widgets", branch: "main" })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(StorageError);
    if (error instanceof StorageError) {
      expect(error.code).toBe("INDEXING_FAILED");
      expect(error.message).toBe("Failed to index acme/widgets: Rate limit exceeded");
      expect(error.cause).toBeInstanceOf(EmbeddingRateLimitError);
    }
  });

  test("rethrows storage errors unchanged", async () => {
    const storageError = new DocumentOperationError("upsert", "Failed to upsert", ["id"]);
    const service = createService(
      vi.fn<DocumentFetcher["fetchDocuments"]>().mockResolvedValue([sampleDocument]),
      vi.fn<IndexingCollaborator["index"]>().mockRejectedValue(storageError)
    );

    await expect(
      service.ingest({ repoUrl: "https://github.com/acme/widgets", branch: "main" })
    ).rejects.toBe(storageError);
  });

  test("hands normalized documents to the indexer", async () => {
    const index = vi
      .fn<IndexingCollaborator["index"]>()
      .mockResolvedValue({ documents: 1, chunks: 3 });
    const service = createService(
      vi.fn<DocumentFetcher["fetchDocuments"]>().mockResolvedValue([sampleDocument]),
      index
    );

    const result = await service.ingest({
      repoUrl: "https://github.com/acme/widgets",
      branch: "main",
    });

    expect(result.chunksStored).toBe(3);
    expect(index).toHaveBeenCalledWith("github_acme_widgets", [
      {
        text: "x",
        id: "sha",
        path: "a.py",
        metadata: {
          owner: "acme",
          repo: "widgets",
          branch: "main",
          namespace: "github_acme_widgets",
        },
      },
    ]);
  });
});
