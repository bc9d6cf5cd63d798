#!/usr/bin/env node
/**
 * List promotion audit records from the SQLite audit store.
 *
 * Usage:
 *   npm run ml:audit -- [--model iris_classifier] [--decision promote|reject|skip] [--limit 20] [--json]
 */

import minimist from "minimist";

import { SqliteAuditRecorder } from "../../ml/audit/sqlite_audit_recorder";
import type { AuditRecord } from "../../ml/audit/types";
import { loadConfig } from "../../ml/config/config";
import { toRunFailureArtifact } from "../../ml/errors";
import { createLogger, formatMetrics } from "../../ml/logging/logger";
import type { DecisionOutcome } from "../../ml/promotions/decision";
import { optionalNumber, optionalString } from "./lib/args";

const DECISIONS: readonly DecisionOutcome[] = ["promote", "reject", "skip"];

function parseDecision(raw: string | undefined): DecisionOutcome | undefined {
  if (raw === undefined) return undefined;
  const match = DECISIONS.find((d) => d === raw);
  if (!match) {
    throw new Error(`--decision must be one of ${DECISIONS.join(", ")}`);
  }
  return match;
}

function formatRecord(record: AuditRecord): string {
  const champion = record.champion_version === null ? "none" : `v${record.champion_version}`;
  const reasons = record.reasons.length > 0 ? ` (${record.reasons.join(",")})` : "";
  return [
    `${record.recorded_at}  ${record.model_name} v${record.candidate_version} vs ${champion}: ${record.decision}${reasons}`,
    `  candidate ${formatMetrics(record.candidate_metrics)}`,
    `  champion  ${formatMetrics(record.champion_metrics)}`,
  ].join("\n");
}

function main() {
  const parsed = minimist(process.argv.slice(2), {
    string: ["params", "model", "decision", "limit"],
    boolean: ["json"],
  });
  const config = loadConfig({ paramsPath: optionalString(parsed.params) });
  const recorder = new SqliteAuditRecorder({ dbPath: config.audit.dbPath });
  try {
    const records = recorder.query({
      model_name: optionalString(parsed.model),
      decision: parseDecision(optionalString(parsed.decision)),
      limit: optionalNumber(parsed.limit, "limit"),
    });
    if (parsed.json === true) {
      console.log(JSON.stringify(records, null, 2));
      return;
    }
    if (records.length === 0) {
      console.log("No audit records.");
      return;
    }
    for (const record of records) {
      console.log(formatRecord(record));
    }
  } finally {
    recorder.close();
  }
}

try {
  main();
} catch (error) {
  const failure = toRunFailureArtifact(error);
  createLogger("audit").fatal(`${failure.code}: ${failure.reason} | next: ${failure.next_action}`, { failure });
  process.exitCode = 1;
}
