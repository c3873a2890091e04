/**
 * repo-vector-ingest - Main Entry Point
 *
 * Wires the GitHub client, embedding provider, vector store and ingestion
 * pipeline together and serves the HTTP API.
 */

import "dotenv/config";
import { initializeLogger, getComponentLogger } from "./logging/index.js";
import { loadAppConfig, loadLoggerConfig } from "./config/index.js";
import { OpenAIEmbeddingProvider } from "./providers/index.js";
import { ChromaStorageClientImpl } from "./storage/index.js";
import { DocumentChunker, GitHubContentFetcher } from "./ingestion/index.js";
import {
  GitHubClientImpl,
  DocumentIndexer,
  IngestionService,
  JobTracker,
  IngestionQueue,
  SearchServiceImpl,
} from "./services/index.js";
import { createHttpApp, startHttpServer } from "./http/index.js";

initializeLogger(loadLoggerConfig());

const logger = getComponentLogger("main");

/**
 * Initialization order:
 * 1. Configuration (fails fast on missing secrets)
 * 2. External clients: GitHub, OpenAI, ChromaDB (connected and health-checked)
 * 3. Pipeline: chunker, indexer, fetcher, ingestion service
 * 4. Job tracker and queue, search service
 * 5. HTTP server
 */
/**
 * Run every dependency's health check and fail startup on the first that
 * reports unhealthy
 */
async function verifyDependencies(
  dependencies: Record<string, { healthCheck(): Promise<boolean> }>
): Promise<void> {
  for (const [name, dependency] of Object.entries(dependencies)) {
    if (!(await dependency.healthCheck())) {
      throw new Error(`${name} health check failed`);
    }
  }
  logger.info({ dependencies: Object.keys(dependencies) }, "External dependencies healthy");
}

async function main(): Promise<void> {
  logger.info("Initializing repo-vector-ingest");

  try {
    const config = loadAppConfig();

    const githubClient = new GitHubClientImpl({
      token: config.github.token,
      baseUrl: config.github.baseUrl,
      timeoutMs: config.github.timeoutMs,
      maxRetries: config.github.maxRetries,
    });

    const embeddingProvider = new OpenAIEmbeddingProvider(config.embedding);
    logger.info(
      { model: embeddingProvider.modelId, dimensions: embeddingProvider.dimensions },
      "Embedding provider initialized"
    );

    const storageClient = new ChromaStorageClientImpl(config.storage);
    await storageClient.connect();

    await verifyDependencies({
      GitHub: githubClient,
      OpenAI: embeddingProvider,
      ChromaDB: storageClient,
    });

    const chunker = new DocumentChunker(config.chunking);
    const indexer = new DocumentIndexer(chunker, embeddingProvider, storageClient);
    const contentFetcher = new GitHubContentFetcher(githubClient, {
      concurrency: config.ingestion.fetchConcurrency,
    });
    const ingestionService = new IngestionService(contentFetcher, indexer);

    const jobTracker = new JobTracker();
    const ingestionQueue = new IngestionQueue(ingestionService, jobTracker, {
      maxConcurrentJobs: config.ingestion.maxConcurrentJobs,
    });
    const searchService = new SearchServiceImpl(embeddingProvider, storageClient);

    const app = createHttpApp({ ingestionQueue, jobTracker, searchService });
    const server = await startHttpServer(app, config.http);

    logger.info({ host: server.host, port: server.port }, "repo-vector-ingest ready");

    let shuttingDown = false;
    const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
      if (shuttingDown) {
        return;
      }
      shuttingDown = true;
      logger.info({ signal }, "Shutting down");

      await server.close();
      await ingestionQueue.onIdle();

      logger.info("Shutdown complete");
      process.exit(0);
    };

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.on(signal, () => {
        shutdown(signal).catch((error: unknown) => {
          logger.fatal({ err: error }, "Shutdown failed");
          process.exit(1);
        });
      });
    }
  } catch (error) {
    logger.fatal({ err: error }, "Failed to start repo-vector-ingest");
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "Unhandled error in main()");
  process.exit(1);
});
