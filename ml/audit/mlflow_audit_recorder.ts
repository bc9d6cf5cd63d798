import { MlflowTracking, metricEntries } from "../registry/mlflow_tracking";
import type { MlflowTrackingConfig } from "../registry/mlflow_tracking";
import { assertValid, validateAuditRecord } from "../schemas/validators";
import type { AuditReceipt, AuditRecord, AuditRecorder } from "./types";

export const AUDIT_RUN_NAME = "validation_compare_champion_challenger";

export type MlflowAuditRecorderConfig = MlflowTrackingConfig;

export function auditTags(entry: AuditRecord): Array<{ key: string; value: string }> {
  return [
    { key: "model_name", value: entry.model_name },
    { key: "candidate_version", value: String(entry.candidate_version) },
    { key: "champion_version", value: entry.champion_version === null ? "None" : String(entry.champion_version) },
    { key: "decision", value: entry.decision },
    { key: "decision_reasons", value: entry.reasons.join(",") },
    { key: "audit_record_id", value: entry.id },
  ];
}

/**
 * Writes each audit record as an MLflow tracking run: tags carry the
 * decision, metrics are prefixed `candidate_` / `champion_`. Runs can then be
 * searched by `tags.model_name` and `tags.decision`.
 */
export class MlflowAuditRecorder implements AuditRecorder {
  private readonly tracking: MlflowTracking;

  constructor(config: MlflowAuditRecorderConfig) {
    this.tracking = new MlflowTracking(config);
  }

  async record(entry: AuditRecord): Promise<AuditReceipt> {
    assertValid(validateAuditRecord, entry, "AuditRecord");
    const startTime = Date.parse(entry.recorded_at);

    const runId = await this.tracking.logRun({
      runName: AUDIT_RUN_NAME,
      startTime,
      tags: auditTags(entry),
      metrics: [
        ...metricEntries(entry.candidate_metrics, startTime, "candidate"),
        ...metricEntries(entry.champion_metrics, startTime, "champion"),
      ],
    });

    return { record_id: entry.id, location: `mlflow-run:${runId}` };
  }
}
