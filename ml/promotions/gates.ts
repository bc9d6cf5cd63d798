import type { Metrics } from "../evals/metrics";
import type { GateThresholds } from "./thresholds";

export type GateResult = {
  pass: boolean;
  failures: Array<"accuracy_below_threshold" | "f1_below_threshold">;
};

export function evaluateGates(candidate: Metrics, thresholds: GateThresholds): GateResult {
  const failures: GateResult["failures"] = [];

  if (candidate.accuracy < thresholds.min_accuracy) {
    failures.push("accuracy_below_threshold");
  }
  if (candidate.f1_macro < thresholds.min_f1) {
    failures.push("f1_below_threshold");
  }

  return { pass: failures.length === 0, failures };
}
