/**
 * Error handler middleware tests
 */

import { describe, test, expect, beforeAll, afterAll } from "vitest";
import express from "express";
import {
  HttpError,
  badRequest,
  notFound,
  internalError,
  errorHandler,
  notFoundHandler,
} from "../../../../src/http/middleware/error-handler.js";
import { initializeLogger } from "../../../../src/logging/index.js";
import { createLogCapture } from "../../../helpers/log-capture.js";
import { requestJson, startTestServer, type TestServer } from "../../../helpers/http-server.js";

const capture = createLogCapture();

beforeAll(() => {
  initializeLogger({ level: "info", format: "json", stream: capture.stream });
});

describe("HttpError factories", () => {
  test("badRequest", () => {
    const error = badRequest("bad input", "VALIDATION_ERROR");

    expect(error).toBeInstanceOf(HttpError);
    expect(error.statusCode).toBe(400);
    expect(error.message).toBe("bad input");
    expect(error.code).toBe("VALIDATION_ERROR");
    expect(error.name).toBe("HttpError");
  });

  test("notFound", () => {
    expect(notFound("gone").statusCode).toBe(404);
    expect(notFound("gone").code).toBeUndefined();
  });

  test("internalError", () => {
    expect(internalError("boom", "X").statusCode).toBe(500);
  });
});

describe("errorHandler", () => {
  let server: TestServer;

  beforeAll(async () => {
    const app = express();
    app.use(express.json());
    app.get("/teapot", (_req, _res, next) => {
      next(new HttpError(418, "short and stout", "TEAPOT"));
    });
    app.get("/internal", (_req, _res, next) => {
      next(internalError("database password leaked here", "DB_DOWN"));
    });
    app.get("/crash", () => {
      throw new Error("unexpected");
    });
    app.post("/echo", (req, res) => {
      res.json(req.body);
    });
    app.use(notFoundHandler);
    app.use(errorHandler);
    server = await startTestServer(app);
  });

  afterAll(async () => {
    await server.close();
  });

  test("sends client errors with their message and code", async () => {
    const response = await requestJson(server, "GET", "/teapot");

    expect(response.status).toBe(418);
    expect(response.body).toEqual({
      error: { message: "short and stout", code: "TEAPOT", statusCode: 418 },
    });
  });

  test("logs client errors at warn", async () => {
    capture.clear();
    await requestJson(server, "GET", "/teapot");

    const entry = capture.findByMessage("Request rejected: short and stout");
    expect(entry).toMatchObject({ level: "warn", component: "http:error", statusCode: 418 });
  });

  test("hides the message of server-side HttpErrors", async () => {
    const response = await requestJson(server, "GET", "/internal");

    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      error: { message: "Internal server error", code: "DB_DOWN", statusCode: 500 },
    });
  });

  test("maps thrown errors to INTERNAL_ERROR and logs them at error", async () => {
    capture.clear();
    const response = await requestJson(server, "GET", "/crash");

    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      error: { message: "Internal server error", code: "INTERNAL_ERROR", statusCode: 500 },
    });
    expect(capture.findByMessage("Request failed: unexpected")).toMatchObject({
      level: "error",
      path: "/crash",
      method: "GET",
    });
  });

  test("maps JSON parse failures to INVALID_JSON", async () => {
    const response = await requestJson(server, "POST", "/echo", '{"a":');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: { message: "Invalid JSON in request body", code: "INVALID_JSON", statusCode: 400 },
    });
  });

  test("notFoundHandler names the method and path", async () => {
    const response = await requestJson(server, "POST", "/missing", {});

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      error: { message: "Route not found: POST /missing", code: "NOT_FOUND", statusCode: 404 },
    });
  });
});
