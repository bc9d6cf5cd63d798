import { z } from "zod";

import { ModelLoadError, EvaluationError } from "../errors";
import type { ClassProbabilities, FeatureFrame, Predictor, RawPrediction } from "../evals/predictor";

/**
 * JSON model artifacts written by the training stage.
 *
 * - `linear_softmax`: multinomial logistic model, emits class probabilities.
 * - `nearest_centroid`: emits labels only (no probability capability).
 */

export const MODEL_ARTIFACT_FILE = "model.json";

const classesSchema = z.array(z.union([z.string(), z.number()]).transform(String)).min(1);

const linearSoftmaxSchema = z.object({
  format: z.literal("linear_softmax"),
  classes: classesSchema,
  feature_names: z.array(z.string()).min(1),
  weights: z.array(z.array(z.number())),
  intercepts: z.array(z.number()),
});

const nearestCentroidSchema = z.object({
  format: z.literal("nearest_centroid"),
  classes: classesSchema,
  feature_names: z.array(z.string()).min(1),
  centroids: z.array(z.array(z.number())),
});

export const modelArtifactSchema = z
  .discriminatedUnion("format", [linearSoftmaxSchema, nearestCentroidSchema])
  .superRefine((artifact, ctx) => {
    const matrix = artifact.format === "linear_softmax" ? artifact.weights : artifact.centroids;
    if (matrix.length !== artifact.classes.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected ${artifact.classes.length} rows, got ${matrix.length}`,
      });
    }
    if (matrix.some((row) => row.length !== artifact.feature_names.length)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `every row must have ${artifact.feature_names.length} values`,
      });
    }
    if (artifact.format === "linear_softmax" && artifact.intercepts.length !== artifact.classes.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected ${artifact.classes.length} intercepts, got ${artifact.intercepts.length}`,
      });
    }
  });

export type ModelArtifact = z.infer<typeof modelArtifactSchema>;
type LinearSoftmaxArtifact = z.infer<typeof linearSoftmaxSchema>;
type NearestCentroidArtifact = z.infer<typeof nearestCentroidSchema>;

function alignColumns(frame: FeatureFrame, featureNames: string[]): number[][] {
  const indices = featureNames.map((name) => frame.columns.indexOf(name));
  const missing = featureNames.filter((_, i) => indices[i] < 0);
  if (missing.length > 0) {
    throw new EvaluationError(`Holdout is missing feature columns: ${missing.join(", ")}`);
  }
  return frame.rows.map((row, r) =>
    indices.map((index, i) => {
      const value = row[index];
      if (!Number.isFinite(value)) {
        throw new EvaluationError(`Row ${r + 1} has no finite value for feature '${featureNames[i]}'`);
      }
      return value;
    })
  );
}

function softmax(logits: number[]): number[] {
  const max = Math.max(...logits);
  const exps = logits.map((value) => Math.exp(value - max));
  const total = exps.reduce((sum, value) => sum + value, 0);
  return exps.map((value) => value / total);
}

class LinearSoftmaxPredictor implements Predictor {
  readonly classes: readonly string[];

  constructor(private readonly artifact: LinearSoftmaxArtifact) {
    this.classes = artifact.classes;
  }

  predictProba(frame: FeatureFrame): ClassProbabilities {
    const rows = alignColumns(frame, this.artifact.feature_names);
    const probabilities = rows.map((row) =>
      softmax(
        this.artifact.weights.map(
          (weights, c) => this.artifact.intercepts[c] + weights.reduce((sum, w, i) => sum + w * row[i], 0)
        )
      )
    );
    return { classes: [...this.classes], probabilities };
  }

  predict(frame: FeatureFrame): RawPrediction {
    return { kind: "probabilities", ...this.predictProba(frame) };
  }
}

class NearestCentroidPredictor implements Predictor {
  readonly classes: readonly string[];

  constructor(private readonly artifact: NearestCentroidArtifact) {
    this.classes = artifact.classes;
  }

  predict(frame: FeatureFrame): RawPrediction {
    const rows = alignColumns(frame, this.artifact.feature_names);
    const labels = rows.map((row) => {
      let best = 0;
      let bestDistance = Number.POSITIVE_INFINITY;
      this.artifact.centroids.forEach((centroid, c) => {
        const distance = centroid.reduce((sum, value, i) => sum + (value - row[i]) ** 2, 0);
        if (distance < bestDistance) {
          bestDistance = distance;
          best = c;
        }
      });
      return this.artifact.classes[best];
    });
    return { kind: "labels", labels };
  }
}

export function predictorFromArtifact(artifact: ModelArtifact): Predictor {
  if (artifact.format === "linear_softmax") {
    return new LinearSoftmaxPredictor(artifact);
  }
  return new NearestCentroidPredictor(artifact);
}

export function parseModelArtifact(raw: string, source: string): Predictor {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ModelLoadError(`Model artifact is not valid JSON: ${source}`, error);
  }
  const parsed = modelArtifactSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`);
    throw new ModelLoadError(`Model artifact is corrupt (${source}): ${issues.join("; ")}`);
  }
  return predictorFromArtifact(parsed.data);
}
