/**
 * Unit tests for DocumentIndexer
 */

import { describe, test, expect, beforeAll, beforeEach } from "vitest";
import { DocumentIndexer } from "../../../src/services/document-indexer.js";
import { DocumentChunker } from "../../../src/ingestion/document-chunker.js";
import { OpenAIEmbeddingProvider } from "../../../src/providers/openai-embedding.js";
import { ChromaStorageClientImpl } from "../../../src/storage/chroma-client.js";
import { EmbeddingAuthenticationError } from "../../../src/providers/errors.js";
import { initializeLogger } from "../../../src/logging/index.js";
import type { Document } from "../../../src/ingestion/types.js";
import { MockChromaApi } from "../../helpers/chroma-mock.js";
import { MockOpenAIClient, MockStatusError } from "../../helpers/openai-mock.js";
import {
  TEST_DIMENSIONS,
  createProviderConfig,
  createStorageConfig,
} from "../../fixtures/config-fixtures.js";

beforeAll(() => {
  initializeLogger({ level: "silent", format: "json" });
});

const NAMESPACE = "github_acme_widgets";

function doc(id: string | undefined, text: string, path?: string): Document {
  return {
    text,
    metadata: { owner: "acme", repo: "widgets", branch: "main", namespace: NAMESPACE },
    ...(id !== undefined ? { id } : {}),
    ...(path !== undefined ? { path } : {}),
  };
}

describe("DocumentIndexer", () => {
  let chroma: MockChromaApi;
  let openai: MockOpenAIClient;
  let indexer: DocumentIndexer;

  beforeEach(async () => {
    chroma = new MockChromaApi();
    openai = new MockOpenAIClient(TEST_DIMENSIONS);
    const storage = new ChromaStorageClientImpl(createStorageConfig(), () => chroma);
    await storage.connect();
    indexer = new DocumentIndexer(
      new DocumentChunker(),
      new OpenAIEmbeddingProvider(createProviderConfig(), openai),
      storage
    );
  });

  test("returns zero counts for no documents without calling collaborators", async () => {
    await expect(indexer.index(NAMESPACE, [])).resolves.toEqual({ documents: 0, chunks: 0 });
    expect(openai.requests).toHaveLength(0);
    expect(chroma.collection("github").upsertCalls).toBe(0);
  });

  test("embeds and upserts one record per chunk", async () => {
    const result = await indexer.index(NAMESPACE, [
      doc("sha-a", "print('a')", "a.py"),
      doc("sha-b", "# Title", "README.md"),
    ]);

    expect(result).toEqual({ documents: 2, chunks: 2 });
    expect(openai.requests).toHaveLength(1);
    expect(openai.requests[0]?.input).toEqual(["print('a')", "# Title"]);

    const records = chroma.collection("github").records;
    expect([...records.keys()]).toEqual([`${NAMESPACE}:sha-a:0`, `${NAMESPACE}:sha-b:0`]);
    expect(records.get(`${NAMESPACE}:sha-a:0`)?.metadata).toMatchObject({
      owner: "acme",
      namespace: NAMESPACE,
      file_path: "a.py",
      chunk_index: 0,
    });
  });

  test("indexes documents sharing an id once", async () => {
    const result = await indexer.index(NAMESPACE, [
      doc("same", "first"),
      doc("same", "second"),
    ]);

    expect(result).toEqual({ documents: 1, chunks: 1 });
    expect(chroma.collection("github").records.get(`${NAMESPACE}:same:0`)?.document).toBe(
      "first"
    );
  });

  test("assigns distinct ids to documents without one", async () => {
    const result = await indexer.index(NAMESPACE, [doc(undefined, "one"), doc(undefined, "two")]);

    expect(result).toEqual({ documents: 2, chunks: 2 });
    const ids = [...chroma.collection("github").records.keys()];
    expect(new Set(ids).size).toBe(2);
    expect(ids.every((id) => id.startsWith(`${NAMESPACE}:`) && id.endsWith(":0"))).toBe(true);
  });

  test("skips embedding when no document produces a chunk", async () => {
    const result = await indexer.index(NAMESPACE, [doc("blank", "   ")]);

    expect(result).toEqual({ documents: 1, chunks: 0 });
    expect(openai.requests).toHaveLength(0);
    expect(chroma.collection("github").upsertCalls).toBe(0);
  });

  test("propagates embedding failures without upserting", async () => {
    openai.failNext(new MockStatusError(401, "Incorrect API key provided"));

    await expect(indexer.index(NAMESPACE, [doc("a", "text")])).rejects.toBeInstanceOf(
      EmbeddingAuthenticationError
    );
    expect(chroma.collection("github").upsertCalls).toBe(0);
  });
});
