import { describe, it, expect, beforeAll, afterAll } from "vitest";
import type { FastifyInstance } from "fastify";
import { createServer } from "../src/server.js";
import { Logger } from "../src/logger.js";
import { DEFAULT_CONFIG } from "../src/config.js";
import { MAX_JSON_DEPTH } from "../src/json.js";
import type { AppContext } from "../src/context.js";

const logger = new Logger("none");

let app: FastifyInstance;

beforeAll(async () => {
  const ctx: AppContext = { logger, config: { ...DEFAULT_CONFIG, maxSchemaDepth: 2 } };
  app = await createServer(ctx);
});

afterAll(async () => {
  await app.close();
});

describe("POST /v1/canonical/:kind", () => {
  it("returns the canonical request", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/canonical/request",
      payload: {
        messages: [{ role: "user", content: "hi" }],
        model: "m",
        stream: null,
        extra: 1,
      },
    });

    expect(res.statusCode).toBe(200);
    expect(res.body).toBe('{"model":"m","messages":[{"role":"user","content":"hi"}]}');
  });

  it("returns the canonical response with explicit nulls", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/canonical/response",
      payload: {
        id: "r",
        model: "m",
        choices: [],
        usage: { prompt_tokens: 1, completion_tokens: 2, total_tokens: 3 },
      },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ id: "r", system_fingerprint: null });
  });

  it("rejects a request without messages", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/canonical/request",
      payload: { model: "m" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: {
        message: "MissingField at $.messages: expected array, got nothing",
        type: "invalid_request_error",
        param: "$.messages",
        code: "MissingField",
      },
    });
  });

  it("applies the configured schema depth ceiling", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/canonical/schema",
      payload: { type: "array", items: { type: "array", items: { type: "string" } } },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: { code: "DepthExceeded", param: "$.items.items" } });
  });

  it("writes schema properties in ascending key order", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/canonical/schema",
      payload: {
        type: "object",
        properties: { b: { type: "string" }, "10": { type: "number" }, "9": { type: "boolean" } },
      },
    });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toBe("application/json; charset=utf-8");
    expect(res.body).toBe(
      '{"type":"object","properties":{"10":{"type":"number"},"9":{"type":"boolean"},"b":{"type":"string"}}}',
    );
  });

  it("rejects deeply nested tool parameters with a 400", async () => {
    const levels = 1000;
    const res = await app.inject({
      method: "POST",
      url: "/v1/canonical/request",
      headers: { "content-type": "application/json" },
      payload:
        '{"model":"m","messages":[],"tools":[{"type":"function","function":{"name":"f","parameters":' +
        "[".repeat(levels) +
        "]".repeat(levels) +
        "}}]}",
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({
      error: {
        code: "DepthExceeded",
        param: "$.tools[0].function.parameters" + "[0]".repeat(MAX_JSON_DEPTH),
      },
    });
  });

  it("returns 404 for an unknown document kind", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/canonical/widget",
      payload: {},
    });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({ error: { code: "not_found", param: "kind" } });
  });
});

describe("unknown routes", () => {
  it("answer with the error envelope", async () => {
    const res = await app.inject({ method: "GET", url: "/v1/models" });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      error: {
        message: "No route for GET /v1/models",
        type: "invalid_request_error",
        param: null,
        code: "not_found",
      },
    });
  });
});

describe("CORS", () => {
  it("allows cross-origin requests", async () => {
    const res = await app.inject({
      method: "OPTIONS",
      url: "/v1/canonical/request",
      headers: {
        origin: "http://localhost:3000",
        "access-control-request-method": "POST",
      },
    });

    expect(res.headers["access-control-allow-origin"]).toBe("*");
  });
});
