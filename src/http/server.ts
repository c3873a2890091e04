/**
 * HTTP Server Setup
 *
 * Creates the Express application and manages the listener lifecycle.
 */

import express from "express";
import type { Express } from "express";
import type { Server as HttpServer } from "node:http";
import { requestLogging, errorHandler, notFoundHandler } from "./middleware/index.js";
import { createHealthRouter, createIngestRouter, createQueryRouter } from "./routes/index.js";
import type { IngestRouteDependencies } from "./routes/ingest.js";
import type { QueryRouteDependencies } from "./routes/query.js";
import type { HttpServerConfig, HttpServerInstance } from "./types.js";
import { getComponentLogger } from "../logging/index.js";

let logger: ReturnType<typeof getComponentLogger> | null = null;

function getLogger(): ReturnType<typeof getComponentLogger> {
  if (!logger) {
    logger = getComponentLogger("http:server");
  }
  return logger;
}

/**
 * Dependencies required to create the HTTP app
 */
export interface HttpServerDependencies extends IngestRouteDependencies, QueryRouteDependencies {}

/**
 * Create and configure the Express application
 */
export function createHttpApp(deps: HttpServerDependencies): Express {
  const app = express();

  app.use(express.json());

  // Before the routers so every request gets an id
  app.use(requestLogging);

  app.use(createHealthRouter());
  app.use(
    createIngestRouter({ ingestionQueue: deps.ingestionQueue, jobTracker: deps.jobTracker })
  );
  app.use(createQueryRouter({ searchService: deps.searchService }));

  app.use(notFoundHandler);

  // Must be last
  app.use(errorHandler);

  return app;
}

/**
 * Start the HTTP server
 *
 * Resolves once listening, with the bound port (which differs from
 * `config.port` when that is 0).
 */
export async function startHttpServer(
  app: Express,
  config: HttpServerConfig
): Promise<HttpServerInstance> {
  return new Promise((resolve, reject) => {
    let httpServer: HttpServer;

    try {
      httpServer = app.listen(config.port, config.host, () => {
        const address = httpServer.address();
        const port = typeof address === "object" && address !== null ? address.port : config.port;

        getLogger().info({ host: config.host, port }, "HTTP server listening");

        resolve({
          port,
          host: config.host,
          close: (): Promise<void> =>
            new Promise((resolveClose, rejectClose) => {
              getLogger().info("Closing HTTP server");
              httpServer.close((err) => {
                if (err) {
                  getLogger().error({ err }, "Error closing HTTP server");
                  rejectClose(err);
                } else {
                  getLogger().info("HTTP server closed");
                  resolveClose();
                }
              });
            }),
        });
      });

      httpServer.on("error", (error: NodeJS.ErrnoException) => {
        if (error.code === "EADDRINUSE") {
          getLogger().error({ port: config.port, host: config.host }, "Port already in use");
          reject(new Error(`Port ${config.port} is already in use`));
        } else if (error.code === "EACCES") {
          getLogger().error({ port: config.port }, "Permission denied to bind to port");
          reject(new Error(`Permission denied to bind to port ${config.port}`));
        } else {
          getLogger().error({ err: error }, "HTTP server error");
          reject(error);
        }
      });
    } catch (error) {
      getLogger().error({ err: error }, "Failed to create HTTP server");
      reject(error);
    }
  });
}
