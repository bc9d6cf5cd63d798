import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { loadConfig } from "../ml/config/config";
import { createEvaluationTracking, createReloadNotifier, thresholdsFromConfig } from "../ml/config/runtime";
import { ConfigError } from "../ml/errors";
import { MlflowTracking } from "../ml/registry/mlflow_tracking";
import { HttpReloadNotifier, noopReloadNotifier } from "../ml/serving/reload_notifier";

let testDir = "";
let paramsPath = "";

function writeParams(params: unknown) {
  fs.writeFileSync(paramsPath, JSON.stringify(params));
}

describe("loadConfig", () => {
  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), "config-"));
    paramsPath = path.join(testDir, "promotion.params.json");
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it("reads the params file and fills defaults", () => {
    writeParams({ model_name: "iris", gates: { min_accuracy: 0.8 }, holdout: { path: "data/holdout.csv" } });

    const config = loadConfig({ paramsPath, env: {} });

    expect(config.modelName).toBe("iris");
    expect(config.productionAlias).toBe("champion");
    expect(config.registry).toEqual({
      kind: "local",
      trackingUri: "http://localhost:5000",
      pointer: "alias",
      dbPath: path.join("ml", "registry", "registry.db"),
      experiment: "model_promotion",
    });
    expect(config.gates).toEqual({ minAccuracy: 0.8, minF1: 0 });
    expect(config.holdout).toEqual({ path: "data/holdout.csv", labelColumn: "target" });
    expect(config.reload).toEqual({ timeoutMs: 5000 });
    expect(config.logDir).toBe("logs");
  });

  it("lets the environment override the file and ignores empty values", () => {
    writeParams({ model_name: "iris", gates: { min_accuracy: 0.8, min_f1: 0.5 } });

    const config = loadConfig({
      paramsPath,
      env: {
        MODEL_NAME: "wine",
        PROMOTE_MIN_ACCURACY: "0.9",
        PROMOTE_MIN_F1: "",
        REGISTRY_KIND: "mlflow",
        REGISTRY_POINTER: "stage",
        MLFLOW_TRACKING_URI: "http://mlflow.internal:5000",
        MLFLOW_TRACKING_TOKEN: "test-token",
        API_RELOAD_URL: "http://api.internal/reload",
        API_RELOAD_TOKEN: "test-secret",
        RELOAD_TIMEOUT_MS: "2500",
      },
    });

    expect(config.modelName).toBe("wine");
    expect(config.gates).toEqual({ minAccuracy: 0.9, minF1: 0.5 });
    expect(config.registry.kind).toBe("mlflow");
    expect(config.registry.pointer).toBe("stage");
    expect(config.registry.token).toBe("test-token");
    expect(config.reload).toEqual({ url: "http://api.internal/reload", token: "test-secret", timeoutMs: 2500 });
    expect(thresholdsFromConfig(config)).toEqual({ min_accuracy: 0.9, min_f1: 0.5 });
    expect(createReloadNotifier(config)).toBeInstanceOf(HttpReloadNotifier);
  });

  it("uses the no-op notifier without a reload URL", () => {
    writeParams({ model_name: "iris" });
    expect(createReloadNotifier(loadConfig({ paramsPath, env: {} }))).toBe(noopReloadNotifier);
  });

  it("tracks evaluation runs only with the MLflow audit sink", () => {
    writeParams({ model_name: "iris" });
    expect(createEvaluationTracking(loadConfig({ paramsPath, env: {} }))).toBeNull();
    expect(createEvaluationTracking(loadConfig({ paramsPath, env: { AUDIT_SINK: "mlflow" } }))).toBeInstanceOf(
      MlflowTracking
    );
  });

  it("freezes the result", () => {
    writeParams({ model_name: "iris" });
    const config = loadConfig({ paramsPath, env: {} });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.gates)).toBe(true);
  });

  it("raises ConfigError for invalid values", () => {
    writeParams({ model_name: "iris" });
    expect(() => loadConfig({ paramsPath, env: { PROMOTE_MIN_ACCURACY: "1.5" } })).toThrow(ConfigError);
    expect(() => loadConfig({ paramsPath, env: { PROMOTE_MIN_F1: "high" } })).toThrow(/gates\.minF1/);
    expect(() => loadConfig({ paramsPath, env: { REGISTRY_POINTER: "label" } })).toThrow(/registry\.pointer/);
  });

  it("requires a model name", () => {
    expect(() => loadConfig({ paramsPath: path.join(testDir, "absent.json"), env: {} })).toThrow(/modelName/);
  });

  it("rejects a params file that is not JSON", () => {
    fs.writeFileSync(paramsPath, "{ model_name: ");
    expect(() => loadConfig({ paramsPath, env: {} })).toThrow(`Params file is not valid JSON: ${paramsPath}`);
  });
});
