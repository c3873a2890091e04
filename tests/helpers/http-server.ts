/**
 * Test HTTP server helper
 *
 * Starts an app on an ephemeral loopback port and wraps fetch for JSON
 * requests against it.
 *
 * @module tests/helpers/http-server
 */

import type { Express } from "express";
import { startHttpServer } from "../../src/http/server.js";
import type { HttpServerInstance } from "../../src/http/types.js";

export interface TestServer {
  baseUrl: string;
  instance: HttpServerInstance;
  close(): Promise<void>;
}

export interface JsonResponse {
  status: number;
  headers: Headers;
  body: unknown;
}

export async function startTestServer(app: Express): Promise<TestServer> {
  const instance = await startHttpServer(app, { port: 0, host: "127.0.0.1" });
  return {
    baseUrl: `http://127.0.0.1:${instance.port}`,
    instance,
    close: () => instance.close(),
  };
}

/**
 * Send a request and parse the JSON response body
 *
 * A string body is sent verbatim; anything else is JSON-encoded.
 */
export async function requestJson(
  server: TestServer,
  method: "GET" | "POST",
  path: string,
  body?: unknown
): Promise<JsonResponse> {
  const init: RequestInit = { method };
  if (body !== undefined) {
    init.headers = { "content-type": "application/json" };
    init.body = typeof body === "string" ? body : JSON.stringify(body);
  }

  const response = await fetch(`${server.baseUrl}${path}`, init);
  const text = await response.text();
  return {
    status: response.status,
    headers: response.headers,
    body: text.length > 0 ? JSON.parse(text) : null,
  };
}
