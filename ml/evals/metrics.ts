import { EvaluationError } from "../errors";
import type { ClassProbabilities, FeatureFrame, Label, Predictor } from "./predictor";
import { hasProbabilityOutput, toLabels } from "./predictor";

export type Metrics = {
  accuracy: number;
  precision_macro: number;
  recall_macro: number;
  f1_macro: number;
  roc_auc_macro?: number;
};

export type ClassificationReport = Omit<Metrics, "roc_auc_macro">;

function safeDivide(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Accuracy plus macro precision/recall/F1 over the union of true and
 * predicted labels. Undefined ratios count as 0.
 */
export function classificationReport(labels: Label[], predictions: Label[]): ClassificationReport {
  if (labels.length !== predictions.length) {
    throw new EvaluationError(
      `Predictions (${predictions.length}) and labels (${labels.length}) cannot be aligned`
    );
  }
  if (labels.length === 0) {
    throw new EvaluationError("Holdout is empty; nothing to score");
  }

  const classes = Array.from(new Set([...labels, ...predictions])).sort();
  const precision: number[] = [];
  const recall: number[] = [];
  const f1: number[] = [];
  let correct = 0;

  for (let i = 0; i < labels.length; i += 1) {
    if (labels[i] === predictions[i]) correct += 1;
  }

  for (const cls of classes) {
    let tp = 0;
    let fp = 0;
    let fn = 0;
    for (let i = 0; i < labels.length; i += 1) {
      const actual = labels[i] === cls;
      const predicted = predictions[i] === cls;
      if (actual && predicted) tp += 1;
      else if (predicted) fp += 1;
      else if (actual) fn += 1;
    }
    precision.push(safeDivide(tp, tp + fp));
    recall.push(safeDivide(tp, tp + fn));
    f1.push(safeDivide(2 * tp, 2 * tp + fp + fn));
  }

  return {
    accuracy: correct / labels.length,
    precision_macro: mean(precision),
    recall_macro: mean(recall),
    f1_macro: mean(f1),
  };
}

/** Mann-Whitney AUC with average ranks for tied scores. */
export function binaryAuc(positive: boolean[], scores: number[]): number | null {
  const positives = positive.filter(Boolean).length;
  const negatives = positive.length - positives;
  if (positives === 0 || negatives === 0) return null;

  const order = scores.map((score, index) => ({ score, index })).sort((a, b) => a.score - b.score);
  const ranks = new Array<number>(scores.length);
  let i = 0;
  while (i < order.length) {
    let j = i;
    while (j + 1 < order.length && order[j + 1].score === order[i].score) j += 1;
    const averageRank = (i + j) / 2 + 1;
    for (let k = i; k <= j; k += 1) ranks[order[k].index] = averageRank;
    i = j + 1;
  }

  let positiveRankSum = 0;
  positive.forEach((isPositive, index) => {
    if (isPositive) positiveRankSum += ranks[index];
  });
  return (positiveRankSum - (positives * (positives + 1)) / 2) / (positives * negatives);
}

/**
 * Macro one-vs-rest ROC-AUC over the classes represented in `labels`.
 * Returns null when fewer than two classes are represented.
 */
export function macroRocAuc(labels: Label[], output: ClassProbabilities): number | null {
  if (output.probabilities.length !== labels.length) {
    throw new EvaluationError(
      `Probabilities (${output.probabilities.length}) and labels (${labels.length}) cannot be aligned`
    );
  }
  const present = Array.from(new Set(labels)).sort();
  if (present.length < 2) return null;

  const aucs: number[] = [];
  for (const cls of present) {
    const column = output.classes.indexOf(cls);
    const scores = output.probabilities.map((row) => (column >= 0 ? row[column] ?? 0 : 0));
    const auc = binaryAuc(
      labels.map((label) => label === cls),
      scores
    );
    if (auc !== null) aucs.push(auc);
  }
  return aucs.length === 0 ? null : mean(aucs);
}

/**
 * Scores a predictor against a labelled holdout.
 *
 * The four classification metrics are mandatory. `roc_auc_macro` is only
 * attempted when the predictor has probability output, and is left out when
 * the holdout represents fewer than two classes.
 */
export function scoreModel(predictor: Predictor | null | undefined, features: FeatureFrame, labels: Label[]): Metrics {
  if (!predictor) {
    throw new EvaluationError("No prediction capability supplied for scoring");
  }
  if (features.rows.length !== labels.length) {
    throw new EvaluationError(
      `Feature rows (${features.rows.length}) and labels (${labels.length}) cannot be aligned`
    );
  }

  const raw = predictor.predict(features);
  const metrics: Metrics = classificationReport(labels, toLabels(raw));

  if (hasProbabilityOutput(predictor)) {
    const probabilities = raw.kind === "probabilities" ? raw : predictor.predictProba(features);
    const auc = macroRocAuc(labels, probabilities);
    if (auc !== null) metrics.roc_auc_macro = auc;
  }

  return metrics;
}
