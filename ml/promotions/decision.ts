import type { Metrics } from "../evals/metrics";
import { isBetterOrEqual } from "./compare";
import { evaluateGates } from "./gates";
import type { GateThresholds } from "./thresholds";

export type DecisionOutcome = "promote" | "reject" | "skip";

export type ReasonCode = "failed_gates" | "not_better_than_champion" | "already_champion";

export type PromotionDecision = Readonly<{
  outcome: DecisionOutcome;
  reasons: readonly ReasonCode[];
}>;

function freezeDecision(outcome: DecisionOutcome, reasons: ReasonCode[]): PromotionDecision {
  return Object.freeze({ outcome, reasons: Object.freeze([...reasons]) });
}

/**
 * Gate-then-compare promotion policy. Pure and total.
 *
 * Equal metrics count as "better": a candidate that only matches the
 * champion still replaces it.
 */
export function decidePromotion(
  candidate: Metrics,
  champion: Metrics | null,
  thresholds: GateThresholds
): PromotionDecision {
  const gatesOk = evaluateGates(candidate, thresholds).pass;
  const betterOrEqual = champion ? isBetterOrEqual(candidate, champion) : true;

  if (gatesOk && betterOrEqual) {
    return freezeDecision("promote", []);
  }

  const reasons: ReasonCode[] = [];
  if (!gatesOk) reasons.push("failed_gates");
  if (champion && !betterOrEqual) reasons.push("not_better_than_champion");
  return freezeDecision("reject", reasons);
}

export function skipDecision(): PromotionDecision {
  return freezeDecision("skip", ["already_champion"]);
}
