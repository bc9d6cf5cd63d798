import crypto from "node:crypto";

import type { Metrics } from "../evals/metrics";
import type { DecisionOutcome, PromotionDecision, ReasonCode } from "../promotions/decision";

export type AuditRecord = {
  id: string;
  recorded_at: string;
  model_name: string;
  candidate_version: number;
  champion_version: number | null;
  decision: DecisionOutcome;
  reasons: ReasonCode[];
  candidate_metrics: Metrics | null;
  champion_metrics: Metrics | null;
};

export type AuditReceipt = {
  record_id: string;
  location: string;
};

export type AuditQuery = {
  model_name?: string;
  decision?: DecisionOutcome;
  limit?: number;
};

/** Append-only sink for one comparison record per promotion run. */
export interface AuditRecorder {
  record(entry: AuditRecord): Promise<AuditReceipt>;
}

export function buildAuditRecord(params: {
  model_name: string;
  candidate_version: number;
  champion_version: number | null;
  decision: PromotionDecision;
  candidate_metrics: Metrics | null;
  champion_metrics: Metrics | null;
  now?: Date;
}): AuditRecord {
  return {
    id: crypto.randomUUID(),
    recorded_at: (params.now ?? new Date()).toISOString(),
    model_name: params.model_name,
    candidate_version: params.candidate_version,
    champion_version: params.champion_version,
    decision: params.decision.outcome,
    reasons: [...params.decision.reasons],
    candidate_metrics: params.candidate_metrics ? { ...params.candidate_metrics } : null,
    champion_metrics: params.champion_metrics ? { ...params.champion_metrics } : null,
  };
}
