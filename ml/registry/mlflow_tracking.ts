import { z } from "zod";

import type { Metrics } from "../evals/metrics";
import { MlflowApiError, emptySchema, mlflowJson } from "./mlflow_http";
import type { MlflowConnection } from "./mlflow_http";

const experimentSchema = z.object({ experiment: z.object({ experiment_id: z.string() }) });
const createdExperimentSchema = z.object({ experiment_id: z.string() });
const createdRunSchema = z.object({ run: z.object({ info: z.object({ run_id: z.string() }) }) });

export type MlflowTrackingConfig = MlflowConnection & {
  experiment: string;
};

export type RunTag = { key: string; value: string };
export type RunMetric = { key: string; value: number; timestamp: number; step: number };

export type TrackedRun = {
  runName: string;
  startTime: number;
  tags: RunTag[];
  metrics: RunMetric[];
};

/** Numeric entries of a metrics object, optionally prefixed (`candidate_accuracy`). */
export function metricEntries(metrics: Metrics | null, timestamp: number, prefix?: string): RunMetric[] {
  if (!metrics) return [];
  return Object.entries(metrics)
    .filter((entry): entry is [string, number] => typeof entry[1] === "number")
    .map(([key, value]) => ({ key: prefix ? `${prefix}_${key}` : key, value, timestamp, step: 0 }));
}

/**
 * Logs finished runs to one MLflow experiment, creating the experiment on
 * first use. The experiment id is looked up once per instance.
 */
export class MlflowTracking {
  private experimentId: string | null = null;

  constructor(private readonly config: MlflowTrackingConfig) {}

  /** create → log-batch → update(FINISHED); returns the run id. */
  async logRun(run: TrackedRun): Promise<string> {
    const experimentId = await this.ensureExperiment();

    const created = await mlflowJson(
      this.config,
      {
        method: "POST",
        path: "/api/2.0/mlflow/runs/create",
        body: { experiment_id: experimentId, run_name: run.runName, start_time: run.startTime, tags: run.tags },
      },
      createdRunSchema
    );
    const runId = created.run.info.run_id;

    await mlflowJson(
      this.config,
      { method: "POST", path: "/api/2.0/mlflow/runs/log-batch", body: { run_id: runId, metrics: run.metrics } },
      emptySchema
    );

    await mlflowJson(
      this.config,
      {
        method: "POST",
        path: "/api/2.0/mlflow/runs/update",
        body: { run_id: runId, status: "FINISHED", end_time: Date.now() },
      },
      emptySchema
    );
    return runId;
  }

  private async ensureExperiment(): Promise<string> {
    if (this.experimentId) return this.experimentId;
    const experimentId = await this.lookupExperiment();
    this.experimentId = experimentId;
    return experimentId;
  }

  private async lookupExperiment(): Promise<string> {
    try {
      const found = await mlflowJson(
        this.config,
        {
          method: "GET",
          path: "/api/2.0/mlflow/experiments/get-by-name",
          query: { experiment_name: this.config.experiment },
        },
        experimentSchema
      );
      return found.experiment.experiment_id;
    } catch (error) {
      if (!(error instanceof MlflowApiError && error.notFound)) throw error;
    }
    const created = await mlflowJson(
      this.config,
      { method: "POST", path: "/api/2.0/mlflow/experiments/create", body: { name: this.config.experiment } },
      createdExperimentSchema
    );
    return created.experiment_id;
  }
}
