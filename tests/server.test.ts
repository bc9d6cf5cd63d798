import { describe, it, expect, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";

import { createLogger } from "../ml/logging/logger";
import type { Predictor } from "../ml/evals/predictor";
import { ModelHandle } from "../ml/serving/model_handle";
import { buildServer } from "../ml/serving/server";
import { makeVersion } from "./helpers/in_memory_registry";

const logger = createLogger("server-test", { silent: true });

const sign: Predictor = {
  classes: ["neg", "pos"],
  predict: (frame) => {
    const column = frame.columns.indexOf("x");
    return { kind: "labels", labels: frame.rows.map((row) => (row[column] >= 0 ? "pos" : "neg")) };
  },
};

let app: FastifyInstance | null = null;

function serve(handle: ModelHandle, options: { reloadToken?: string; bodyLimit?: number } = {}) {
  app = buildServer(handle, { logger, ...options });
  return app;
}

afterEach(async () => {
  await app?.close();
  app = null;
});

describe("buildServer", () => {
  it("reports health with no model and after a reload", async () => {
    const server = serve(new ModelHandle(async () => ({ version: makeVersion("iris", 7), predictor: sign })));

    const before = await server.inject({ method: "GET", url: "/health" });
    expect(before.statusCode).toBe(200);
    expect(before.json()).toEqual({ status: "ok", model_version: null });

    const reload = await server.inject({ method: "POST", url: "/reload" });
    expect(reload.statusCode).toBe(200);
    expect(reload.json()).toEqual({ status: "reloaded", model_version: 7 });

    expect((await server.inject({ method: "GET", url: "/health" })).json()).toEqual({
      status: "ok",
      model_version: 7,
    });
  });

  it("serves predictions from the loaded model", async () => {
    const handle = new ModelHandle(async () => ({ version: makeVersion("iris", 2), predictor: sign }));
    const server = serve(handle);

    const cold = await server.inject({ method: "POST", url: "/predict", payload: { records: [{ x: 1 }] } });
    expect(cold.statusCode).toBe(503);

    await handle.reload();
    const response = await server.inject({
      method: "POST",
      url: "/predict",
      payload: { records: [{ x: 3 }, { x: -1 }] },
    });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ predictions: ["pos", "neg"], model_version: 2 });
  });

  it("answers 400 for incomplete records and malformed JSON", async () => {
    const handle = new ModelHandle(async () => ({ version: makeVersion("iris", 2), predictor: sign }));
    await handle.reload();
    const server = serve(handle);

    const incomplete = await server.inject({
      method: "POST",
      url: "/predict",
      payload: { records: [{ x: -5, y: 1 }, { y: 1 }] },
    });
    expect(incomplete.statusCode).toBe(400);
    expect(incomplete.json()).toEqual({ error: "Record 1 is missing features: x" });

    const malformed = await server.inject({
      method: "POST",
      url: "/predict",
      headers: { "content-type": "application/json" },
      payload: "{ records: ",
    });
    expect(malformed.statusCode).toBe(400);
    expect(malformed.json()).toMatchObject({ error: expect.any(String) });
  });

  it("refuses bodies over the limit", async () => {
    const server = serve(
      new ModelHandle(async () => ({ version: makeVersion("iris", 1), predictor: sign })),
      { bodyLimit: 32 }
    );
    const response = await server.inject({
      method: "POST",
      url: "/predict",
      payload: { records: Array.from({ length: 20 }, (_, i) => ({ x: i })) },
    });
    expect(response.statusCode).toBe(413);
  });

  it("guards reload with the bearer token", async () => {
    const server = serve(
      new ModelHandle(async () => ({ version: makeVersion("iris", 5), predictor: sign })),
      { reloadToken: "test-secret" }
    );

    const denied = await server.inject({ method: "POST", url: "/reload" });
    expect(denied.statusCode).toBe(401);
    expect(denied.json()).toEqual({ error: "Unauthorized" });

    const allowed = await server.inject({
      method: "POST",
      url: "/reload",
      headers: { authorization: "Bearer test-secret", "content-type": "application/json" },
      payload: "{}",
    });
    expect(allowed.statusCode).toBe(200);
    expect(allowed.json()).toEqual({ status: "reloaded", model_version: 5 });
  });

  it("answers 404 for unknown routes", async () => {
    const server = serve(new ModelHandle(async () => ({ version: makeVersion("iris", 1), predictor: sign })));
    const response = await server.inject({ method: "GET", url: "/models" });
    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: "Not found: GET /models" });
  });
});
