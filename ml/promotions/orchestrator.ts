import type { AuditReceipt, AuditRecorder } from "../audit/types";
import { buildAuditRecord } from "../audit/types";
import type { HoldoutSet } from "../data/holdout";
import { ConsistencyError, NoVersionsError } from "../errors";
import { scoreModel } from "../evals/metrics";
import type { Metrics } from "../evals/metrics";
import { formatMetrics } from "../logging/logger";
import type { Logger } from "../logging/logger";
import { pickCandidate } from "../registry/types";
import type { ModelVersion, RegistryClient } from "../registry/types";
import type { ReloadNotifier, ReloadOutcome } from "../serving/reload_notifier";
import { compareMetrics } from "./compare";
import { decidePromotion, skipDecision } from "./decision";
import type { PromotionDecision } from "./decision";
import type { GateThresholds } from "./thresholds";

export type RunState = "start" | "resolved" | "scored" | "decided" | "audited" | "skipped" | "mutated" | "done";

export type PromotionDeps = {
  registry: RegistryClient;
  audit: AuditRecorder;
  holdout: HoldoutSet;
  logger: Logger;
  notifier?: ReloadNotifier;
};

export type PromotionOptions = {
  model_name: string;
  thresholds: GateThresholds;
};

export type PromotionRunResult = {
  model_name: string;
  candidate: ModelVersion;
  champion: ModelVersion | null;
  decision: PromotionDecision;
  candidate_metrics: Metrics | null;
  champion_metrics: Metrics | null;
  audit: AuditReceipt;
  reload: ReloadOutcome;
  states: RunState[];
  warnings: string[];
};

export const DECISION_TAG = "decision";
export const REJECTED_REASON_TAG = "rejected_reason";

async function scoreVersion(registry: RegistryClient, version: ModelVersion, holdout: HoldoutSet): Promise<Metrics> {
  const predictor = await registry.loadPredictor(version);
  return scoreModel(predictor, holdout.features, holdout.labels);
}

/**
 * One promotion run for `options.model_name`.
 *
 * Side effects happen in a fixed order: audit record, then registry mutation,
 * then reload notification. Fatal errors (no versions, unreachable registry,
 * unloadable artifact, evaluation failure) reject before anything is written.
 * A reject decision is a normal result, not an error.
 */
export async function runPromotion(deps: PromotionDeps, options: PromotionOptions): Promise<PromotionRunResult> {
  const { registry, audit, holdout, logger } = deps;
  const name = options.model_name;
  const states: RunState[] = ["start"];
  const warnings: string[] = [];

  const candidate = pickCandidate(await registry.listVersions(name));
  if (!candidate) {
    throw new NoVersionsError(name);
  }
  const champion = await registry.resolveChampion(name);
  states.push("resolved");

  logger.info(`Candidate: ${name} v${candidate.version} (stage=${candidate.stage})`);
  logger.info(champion ? `Champion: ${name} v${champion.version}` : `No current champion for ${name}.`);

  const bestEffortTag = async (key: string, value: string) => {
    try {
      await registry.tag(name, candidate.version, key, value);
    } catch (error) {
      const message = `Tag ${key}=${value} on v${candidate.version} failed: ${
        error instanceof Error ? error.message : String(error)
      }`;
      warnings.push(message);
      logger.warn(message);
    }
  };

  if (champion && champion.version === candidate.version) {
    const decision = skipDecision();
    const receipt = await audit.record(
      buildAuditRecord({
        model_name: name,
        candidate_version: candidate.version,
        champion_version: champion.version,
        decision,
        candidate_metrics: null,
        champion_metrics: null,
      })
    );
    states.push("audited", "skipped", "done");
    logger.info("Candidate is already the production champion; skipping.");
    return {
      model_name: name,
      candidate,
      champion,
      decision,
      candidate_metrics: null,
      champion_metrics: null,
      audit: receipt,
      reload: { attempted: false },
      states,
      warnings,
    };
  }

  const [candidateMetrics, championMetrics] = await Promise.all([
    scoreVersion(registry, candidate, holdout),
    champion ? scoreVersion(registry, champion, holdout) : Promise.resolve(null),
  ]);
  states.push("scored");

  logger.info(`Candidate metrics: ${formatMetrics(candidateMetrics)}`, { metrics: candidateMetrics });
  if (championMetrics) {
    logger.info(`Champion metrics: ${formatMetrics(championMetrics)}`, { metrics: championMetrics });
    const deltas = compareMetrics(candidateMetrics, championMetrics);
    logger.info(
      `Deltas: accuracy=${deltas.accuracy_delta.toFixed(4)} f1_macro=${deltas.f1_delta.toFixed(4)}`,
      { deltas }
    );
  }

  const decision = decidePromotion(candidateMetrics, championMetrics, options.thresholds);
  states.push("decided");

  const receipt = await audit.record(
    buildAuditRecord({
      model_name: name,
      candidate_version: candidate.version,
      champion_version: champion ? champion.version : null,
      decision,
      candidate_metrics: candidateMetrics,
      champion_metrics: championMetrics,
    })
  );
  states.push("audited");
  logger.info(`Audit record written: ${receipt.location}`);

  let reload: ReloadOutcome = { attempted: false };

  if (decision.outcome === "promote") {
    await registry.promote(name, candidate.version);
    const pointer = await registry.resolveChampion(name);
    if (!pointer || pointer.version !== candidate.version) {
      throw new ConsistencyError(
        `Production pointer for ${name} is ${pointer ? `v${pointer.version}` : "unset"} after promoting v${candidate.version}`
      );
    }
    states.push("mutated");
    logger.info(`Promoted ${name} v${candidate.version} to production.`);

    await bestEffortTag(DECISION_TAG, "promoted");

    if (deps.notifier) {
      reload = await deps.notifier.notify().catch(
        (error: unknown): ReloadOutcome => ({
          attempted: true,
          ok: false,
          error: error instanceof Error ? error.message : String(error),
        })
      );
      if (!reload.attempted) {
        logger.info("Reload notification not configured.");
      } else if ("error" in reload) {
        logger.error(`Reload request failed: ${reload.error}`);
      } else {
        logger.info(`Reload request status=${reload.status}`);
      }
    }
  } else {
    await bestEffortTag(DECISION_TAG, "rejected");
    await bestEffortTag(REJECTED_REASON_TAG, decision.reasons.join(","));
    logger.info(`Candidate rejected (${decision.reasons.join(",")}); production pointer unchanged.`);
  }

  states.push("done");
  return {
    model_name: name,
    candidate,
    champion,
    decision,
    candidate_metrics: candidateMetrics,
    champion_metrics: championMetrics,
    audit: receipt,
    reload,
    states,
    warnings,
  };
}
