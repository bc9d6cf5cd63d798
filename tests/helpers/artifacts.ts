import fs from "node:fs";
import path from "node:path";

import { MODEL_ARTIFACT_FILE } from "../../ml/registry/model_artifact";

/** Two features, two classes: predicts "1" when x > y, "0" otherwise. */
export const LINEAR_ARTIFACT = {
  format: "linear_softmax",
  classes: [0, 1],
  feature_names: ["x", "y"],
  weights: [
    [-1, 1],
    [1, -1],
  ],
  intercepts: [0, 0],
};

export const CENTROID_ARTIFACT = {
  format: "nearest_centroid",
  classes: ["0", "1"],
  feature_names: ["x", "y"],
  centroids: [
    [0, 1],
    [1, 0],
  ],
};

export const HOLDOUT_CSV = ["x,y,target", "0,1,0", "1,0,1", "0.2,0.9,0", "0.8,0.1,1"].join("\n");

export function writeArtifact(dir: string, artifact: unknown): string {
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, MODEL_ARTIFACT_FILE), JSON.stringify(artifact));
  return dir;
}
