import fs from "node:fs";
import path from "node:path";

import { assertValid, validateMetricsReport } from "../schemas/validators";
import type { Metrics } from "./metrics";

export const METRICS_REPORT_FILE = "metrics.json";

/** Flat `{ metric: value }` report, validated before it is written. */
export function writeMetricsReport(outPath: string, metrics: Metrics): string {
  const report: Record<string, number> = {};
  for (const [key, value] of Object.entries(metrics)) {
    if (typeof value === "number") report[key] = value;
  }
  assertValid(validateMetricsReport, report, "metrics report");
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, `${JSON.stringify(report, null, 2)}\n`, "utf8");
  return outPath;
}

export function readMetricsReport(filePath: string): Metrics {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  assertValid(validateMetricsReport, parsed, "metrics report");
  return parsed;
}
