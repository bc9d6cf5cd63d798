import type { MlflowTracking } from "../registry/mlflow_tracking";
import { metricEntries } from "../registry/mlflow_tracking";
import type { Metrics } from "./metrics";

export const EVALUATION_RUN_NAME = "evaluate_model";

export type EvaluationRun = {
  modelName: string;
  version: number;
  metrics: Metrics;
  startTime?: number;
};

/** Logs one scored version as an `evaluate_model` run with unprefixed metric keys. */
export function logEvaluationRun(tracking: MlflowTracking, run: EvaluationRun): Promise<string> {
  const startTime = run.startTime ?? Date.now();
  return tracking.logRun({
    runName: EVALUATION_RUN_NAME,
    startTime,
    tags: [
      { key: "model_name", value: run.modelName },
      { key: "model_version", value: String(run.version) },
    ],
    metrics: metricEntries(run.metrics, startTime),
  });
}
