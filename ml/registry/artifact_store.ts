import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { ModelLoadError } from "../errors";
import type { Predictor } from "../evals/predictor";
import { MODEL_ARTIFACT_FILE, parseModelArtifact } from "./model_artifact";

/** Accepts a model directory, a model.json path or a file:// URI. */
export function resolveLocalArtifactPath(source: string): string {
  const base = source.startsWith("file:") ? fileURLToPath(source) : path.resolve(source);
  if (fs.existsSync(base) && fs.statSync(base).isDirectory()) {
    return path.join(base, MODEL_ARTIFACT_FILE);
  }
  return base;
}

export function loadLocalPredictor(source: string): Predictor {
  const artifactPath = resolveLocalArtifactPath(source);
  if (!fs.existsSync(artifactPath)) {
    throw new ModelLoadError(`Model artifact not found: ${artifactPath}`);
  }
  return parseModelArtifact(fs.readFileSync(artifactPath, "utf8"), artifactPath);
}
