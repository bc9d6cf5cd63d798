import type { Metrics } from "../evals/metrics";

export type MetricDeltas = {
  accuracy_delta: number;
  f1_delta: number;
  precision_delta: number;
  recall_delta: number;
  roc_auc_delta: number | null;
};

export function compareMetrics(candidate: Metrics, champion: Metrics): MetricDeltas {
  return {
    accuracy_delta: candidate.accuracy - champion.accuracy,
    f1_delta: candidate.f1_macro - champion.f1_macro,
    precision_delta: candidate.precision_macro - champion.precision_macro,
    recall_delta: candidate.recall_macro - champion.recall_macro,
    roc_auc_delta:
      candidate.roc_auc_macro !== undefined && champion.roc_auc_macro !== undefined
        ? candidate.roc_auc_macro - champion.roc_auc_macro
        : null,
  };
}

export function isBetterOrEqual(candidate: Metrics, champion: Metrics): boolean {
  return candidate.accuracy >= champion.accuracy && candidate.f1_macro >= champion.f1_macro;
}
