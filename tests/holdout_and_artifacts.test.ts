import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { loadHoldout, parseHoldoutCsv } from "../ml/data/holdout";
import { EvaluationError, HoldoutMissingError, ModelLoadError } from "../ml/errors";
import { scoreModel } from "../ml/evals/metrics";
import { readMetricsReport, writeMetricsReport } from "../ml/evals/metrics_report";
import { loadLocalPredictor, resolveLocalArtifactPath } from "../ml/registry/artifact_store";
import { parseModelArtifact } from "../ml/registry/model_artifact";
import { SchemaValidationError } from "../ml/schemas/validators";
import { CENTROID_ARTIFACT, HOLDOUT_CSV, LINEAR_ARTIFACT, writeArtifact } from "./helpers/artifacts";

let testDir = "";

beforeEach(() => {
  testDir = fs.mkdtempSync(path.join(os.tmpdir(), "holdout-"));
});

afterEach(() => {
  fs.rmSync(testDir, { recursive: true, force: true });
});

describe("holdout CSV", () => {
  it("splits the label column from numeric features", () => {
    const holdout = parseHoldoutCsv(HOLDOUT_CSV);
    expect(holdout.features).toEqual({
      columns: ["x", "y"],
      rows: [
        [0, 1],
        [1, 0],
        [0.2, 0.9],
        [0.8, 0.1],
      ],
    });
    expect(holdout.labels).toEqual(["0", "1", "0", "1"]);
  });

  it("honours a custom label column in any position", () => {
    const holdout = parseHoldoutCsv("species,x\nsetosa,1.5\nvirginica,2\n", "species");
    expect(holdout.labels).toEqual(["setosa", "virginica"]);
    expect(holdout.features).toEqual({ columns: ["x"], rows: [[1.5], [2]] });
  });

  it("reports malformed input", () => {
    expect(() => parseHoldoutCsv("a,b\n1,2")).toThrow("Holdout is missing label column 'target': <inline>");
    expect(() => parseHoldoutCsv("x,target\n1,0\n2")).toThrow("Row 3 has 1 cells, expected 2");
    expect(() => parseHoldoutCsv("x,target\nabc,0")).toThrow("Non-numeric value 'abc' in column 'x' on row 2");
    expect(() => parseHoldoutCsv("")).toThrow(EvaluationError);
  });

  it("raises HoldoutMissingError for a missing file", () => {
    const missing = path.join(testDir, "test.csv");
    expect(() => loadHoldout(missing)).toThrow(HoldoutMissingError);
    expect(() => loadHoldout(missing)).toThrow(`Holdout dataset not found: ${missing}`);
  });
});

describe("model artifacts", () => {
  it("scores a linear model end to end", () => {
    const csvPath = path.join(testDir, "test.csv");
    fs.writeFileSync(csvPath, HOLDOUT_CSV);
    const predictor = loadLocalPredictor(writeArtifact(path.join(testDir, "model"), LINEAR_ARTIFACT));
    const holdout = loadHoldout(csvPath);

    expect(scoreModel(predictor, holdout.features, holdout.labels)).toEqual({
      accuracy: 1,
      precision_macro: 1,
      recall_macro: 1,
      f1_macro: 1,
      roc_auc_macro: 1,
    });
  });

  it("emits normalised probabilities", () => {
    const predictor = parseModelArtifact(JSON.stringify(LINEAR_ARTIFACT), "inline");
    expect(predictor.predictProba?.({ columns: ["x", "y"], rows: [[0, 0]] })).toEqual({
      classes: ["0", "1"],
      probabilities: [[0.5, 0.5]],
    });
  });

  it("rejects corrupt artifacts with ModelLoadError", () => {
    expect(() => parseModelArtifact("{", "broken")).toThrow(ModelLoadError);
    expect(() => parseModelArtifact(JSON.stringify({ ...CENTROID_ARTIFACT, centroids: [[0, 1]] }), "short")).toThrow(
      /expected 2 rows, got 1/
    );
    expect(() => parseModelArtifact(JSON.stringify({ format: "tree" }), "unknown")).toThrow(ModelLoadError);
  });

  it("needs every feature the model was trained on", () => {
    const predictor = parseModelArtifact(JSON.stringify(CENTROID_ARTIFACT), "inline");
    expect(() => predictor.predict({ columns: ["x"], rows: [[1]] })).toThrow(
      "Holdout is missing feature columns: y"
    );
  });

  it("refuses non-finite feature values instead of guessing a class", () => {
    const predictor = parseModelArtifact(JSON.stringify(LINEAR_ARTIFACT), "inline");
    expect(() => predictor.predict({ columns: ["x", "y"], rows: [[0, 1], [Number.NaN, 1]] })).toThrow(
      "Row 2 has no finite value for feature 'x'"
    );
  });

  it("resolves directories, files and file URIs to model.json", () => {
    const dir = writeArtifact(path.join(testDir, "m"), CENTROID_ARTIFACT);
    const file = path.join(dir, "model.json");
    expect(resolveLocalArtifactPath(dir)).toBe(file);
    expect(resolveLocalArtifactPath(file)).toBe(file);
    expect(resolveLocalArtifactPath(`file://${dir}`)).toBe(file);
  });
});

describe("metrics report", () => {
  it("writes a flat validated report", () => {
    const out = path.join(testDir, "reports", "metrics.json");
    writeMetricsReport(out, { accuracy: 0.5, precision_macro: 0.25, recall_macro: 0.5, f1_macro: 0.25 });
    expect(JSON.parse(fs.readFileSync(out, "utf8"))).toEqual({
      accuracy: 0.5,
      precision_macro: 0.25,
      recall_macro: 0.5,
      f1_macro: 0.25,
    });
    expect(readMetricsReport(out).f1_macro).toBe(0.25);
  });

  it("refuses out-of-range values", () => {
    const out = path.join(testDir, "metrics.json");
    expect(() => writeMetricsReport(out, { accuracy: 2, precision_macro: 0, recall_macro: 0, f1_macro: 0 })).toThrow(
      SchemaValidationError
    );
    expect(fs.existsSync(out)).toBe(false);
  });
});
