export type Label = string;

/** Column-named numeric feature matrix; one entry of `rows` per holdout row. */
export type FeatureFrame = {
  columns: string[];
  rows: number[][];
};

export type ClassProbabilities = {
  classes: Label[];
  probabilities: number[][];
};

export type RawPrediction =
  | { kind: "labels"; labels: Label[] }
  | ({ kind: "probabilities" } & ClassProbabilities);

/**
 * Prediction capability of a loaded model version.
 *
 * `predictProba` is an optional capability: only models that can emit
 * per-class probabilities implement it, and ROC-AUC is computed only then.
 */
export interface Predictor {
  readonly classes: readonly Label[];
  predict(frame: FeatureFrame): RawPrediction;
  predictProba?(frame: FeatureFrame): ClassProbabilities;
}

export function hasProbabilityOutput(
  predictor: Predictor
): predictor is Predictor & { predictProba(frame: FeatureFrame): ClassProbabilities } {
  return typeof predictor.predictProba === "function";
}

export function argmaxLabels(output: ClassProbabilities): Label[] {
  return output.probabilities.map((row) => {
    let bestIndex = 0;
    for (let i = 1; i < row.length; i += 1) {
      if (row[i] > row[bestIndex]) bestIndex = i;
    }
    const label = output.classes[bestIndex];
    return label ?? String(bestIndex);
  });
}

export function toLabels(raw: RawPrediction): Label[] {
  if (raw.kind === "labels") return raw.labels;
  return argmaxLabels(raw);
}
