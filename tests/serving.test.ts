import { describe, it, expect, afterEach, vi } from "vitest";

import { createLogger } from "../ml/logging/logger";
import type { Predictor } from "../ml/evals/predictor";
import { handlePredict, handleReload, recordsToFrame } from "../ml/serving/handlers";
import { ModelHandle } from "../ml/serving/model_handle";
import type { ModelLoader } from "../ml/serving/model_handle";
import { DEFAULT_RELOAD_TIMEOUT_MS, HttpReloadNotifier, noopReloadNotifier } from "../ml/serving/reload_notifier";
import { fixedLabels, makeVersion } from "./helpers/in_memory_registry";

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

const sign: Predictor = {
  classes: ["neg", "pos"],
  predict: (frame) => {
    const column = frame.columns.indexOf("x");
    return { kind: "labels", labels: frame.rows.map((row) => (row[column] >= 0 ? "pos" : "neg")) };
  },
};

describe("ModelHandle", () => {
  it("starts empty and swaps in a loaded snapshot", async () => {
    const handle = new ModelHandle(async () => ({ version: makeVersion("iris", 1), predictor: sign }));
    expect(handle.current()).toBeNull();

    const loaded = await handle.reload();
    expect(handle.current()).toBe(loaded);
    expect(loaded.version.version).toBe(1);
    expect(Object.isFrozen(loaded)).toBe(true);
  });

  it("keeps the previous model when a reload fails", async () => {
    let calls = 0;
    const handle = new ModelHandle(async () => {
      calls += 1;
      if (calls === 2) throw new Error("artifact missing");
      return { version: makeVersion("iris", calls), predictor: sign };
    });

    const first = await handle.reload();
    await expect(handle.reload()).rejects.toThrow("artifact missing");
    expect(handle.current()).toBe(first);

    const third = await handle.reload();
    expect(third.version.version).toBe(3);
  });

  it("runs reloads one at a time in call order", async () => {
    const gates = [deferred<void>(), deferred<void>()];
    const started: number[] = [];
    let next = 0;
    const loader: ModelLoader = async () => {
      const index = next;
      next += 1;
      started.push(index);
      await gates[index].promise;
      return { version: makeVersion("iris", index + 1), predictor: sign };
    };
    const handle = new ModelHandle(loader);

    const a = handle.reload();
    const b = handle.reload();
    await Promise.resolve();
    await Promise.resolve();
    expect(started).toEqual([0]);

    gates[0].resolve();
    await a;
    expect(handle.current()?.version.version).toBe(1);

    gates[1].resolve();
    await b;
    expect(started).toEqual([0, 1]);
    expect(handle.current()?.version.version).toBe(2);
  });
});

describe("serving handlers", () => {
  const logger = createLogger("serve-test", { silent: true });

  it("answers 503 before a model is loaded", () => {
    const handle = new ModelHandle(async () => ({ version: makeVersion("iris", 1), predictor: sign }));
    expect(handlePredict(handle, { records: [{ x: 1 }] }, logger)).toEqual({
      status: 503,
      body: { error: "Model not loaded" },
    });
  });

  it("predicts with the current snapshot", async () => {
    const handle = new ModelHandle(async () => ({ version: makeVersion("iris", 4), predictor: sign }));
    await handle.reload();

    expect(handlePredict(handle, { records: [{ x: 1 }, { x: -2 }] }, logger)).toEqual({
      status: 200,
      body: { predictions: ["pos", "neg"], model_version: 4 },
    });
    expect(handlePredict(handle, { records: [] }, logger).status).toBe(400);
    expect(handlePredict(handle, { rows: [[1]] }, logger).status).toBe(400);
  });

  it("reports prediction errors as 400", async () => {
    const broken: Predictor = {
      classes: ["a"],
      predict: () => {
        throw new Error("Holdout is missing feature columns: y");
      },
    };
    const handle = new ModelHandle(async () => ({ version: makeVersion("iris", 1), predictor: broken }));
    await handle.reload();
    expect(handlePredict(handle, { records: [{ x: 1 }] }, logger)).toEqual({
      status: 400,
      body: { error: "Holdout is missing feature columns: y" },
    });
  });

  it("rejects records that lack a feature other records carry", async () => {
    expect(() => recordsToFrame([{ x: 1 }, { y: 2 }])).toThrow("Record 0 is missing features: y");

    const handle = new ModelHandle(async () => ({ version: makeVersion("iris", 1), predictor: sign }));
    await handle.reload();
    expect(handlePredict(handle, { records: [{ x: -5, y: 1 }, { y: 1 }] }, logger)).toEqual({
      status: 400,
      body: { error: "Record 1 is missing features: x" },
    });
  });

  it("builds the frame from the union of record keys", () => {
    expect(recordsToFrame([{ x: 1, y: 2 }, { y: 4, x: 3 }])).toEqual({
      columns: ["x", "y"],
      rows: [
        [1, 2],
        [3, 4],
      ],
    });
  });

  it("guards reload with the bearer token", async () => {
    const handle = new ModelHandle(async () => ({ version: makeVersion("iris", 2), predictor: fixedLabels(["a"]) }));

    expect(await handleReload(handle, undefined, "test-secret", logger)).toEqual({
      status: 401,
      body: { error: "Unauthorized" },
    });
    expect(await handleReload(handle, "Bearer test-secret", "test-secret", logger)).toEqual({
      status: 200,
      body: { status: "reloaded", model_version: 2 },
    });
  });

  it("returns 500 with the model still serving when reload fails", async () => {
    let fail = false;
    const handle = new ModelHandle(async () => {
      if (fail) throw new Error("registry unreachable");
      return { version: makeVersion("iris", 1), predictor: sign };
    });
    await handle.reload();
    fail = true;

    expect(await handleReload(handle, undefined, undefined, logger)).toEqual({
      status: 500,
      body: { error: "registry unreachable", model_version: 1 },
    });
  });
});

describe("HttpReloadNotifier", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts JSON with the bearer token and reports the status", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(null, { status: 202 }));
    vi.stubGlobal("fetch", fetchMock);

    const outcome = await new HttpReloadNotifier({ url: "http://api.test/reload", token: "test-secret" }).notify();

    expect(outcome).toEqual({ attempted: true, ok: true, status: 202 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://api.test/reload");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-secret" });
    expect(init?.body).toBe("{}");
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("reports non-2xx answers without throwing", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("nope", { status: 500 })));
    expect(await new HttpReloadNotifier({ url: "http://api.test/reload" }).notify()).toEqual({
      attempted: true,
      ok: false,
      status: 500,
    });
  });

  it("cancels the response body once the status is read", async () => {
    const cancel = vi.fn(async () => undefined);
    const body = new ReadableStream<Uint8Array>({ cancel });
    vi.stubGlobal("fetch", vi.fn(async () => new Response(body, { status: 200 })));

    expect(await new HttpReloadNotifier({ url: "http://api.test/reload" }).notify()).toEqual({
      attempted: true,
      ok: true,
      status: 200,
    });
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it("turns network failures into an outcome", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new Error("connect ECONNREFUSED");
      })
    );
    expect(await new HttpReloadNotifier({ url: "http://api.test/reload" }).notify()).toEqual({
      attempted: true,
      ok: false,
      error: "connect ECONNREFUSED",
    });
  });

  it("defaults to a five second timeout and a no-op notifier", async () => {
    expect(DEFAULT_RELOAD_TIMEOUT_MS).toBe(5000);
    expect(await noopReloadNotifier.notify()).toEqual({ attempted: false });
  });
});
