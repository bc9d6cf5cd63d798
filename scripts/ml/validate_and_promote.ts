#!/usr/bin/env node
/**
 * Validate the newest registered version against the production champion and
 * promote it when it clears the gates.
 *
 * Usage:
 *   npm run ml:promote -- [--model iris_classifier] [--params config/promotion.params.json]
 *                         [--min_accuracy 0.9] [--min_f1 0.9] [--json]
 *
 * Exit codes: 0 for promote, reject and skip; 1 when the run fails.
 */

import minimist from "minimist";

import { loadConfig } from "../../ml/config/config";
import { createAuditRecorder, createRegistry, createReloadNotifier, thresholdsFromConfig } from "../../ml/config/runtime";
import { loadHoldout } from "../../ml/data/holdout";
import { toRunFailureArtifact } from "../../ml/errors";
import { createLogger } from "../../ml/logging/logger";
import { runPromotion } from "../../ml/promotions/orchestrator";
import { freezeThresholds } from "../../ml/promotions/thresholds";
import { optionalNumber, optionalString } from "./lib/args";

type Args = {
  params?: string;
  model?: string;
  minAccuracy?: number;
  minF1?: number;
  json: boolean;
};

function parseArgs(argv: string[]): Args {
  const parsed = minimist(argv, {
    string: ["params", "model", "min_accuracy", "min_f1"],
    boolean: ["json"],
  });
  return {
    params: optionalString(parsed.params),
    model: optionalString(parsed.model),
    minAccuracy: optionalNumber(parsed.min_accuracy, "min_accuracy"),
    minF1: optionalNumber(parsed.min_f1, "min_f1"),
    json: parsed.json === true,
  };
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig({ paramsPath: args.params });
  const logger = createLogger("promote", { logDir: config.logDir });

  const configured = thresholdsFromConfig(config);
  const thresholds = freezeThresholds({
    min_accuracy: args.minAccuracy ?? configured.min_accuracy,
    min_f1: args.minF1 ?? configured.min_f1,
  });
  const modelName = args.model ?? config.modelName;

  const registry = createRegistry(config);
  const audit = createAuditRecorder(config);
  try {
    logger.info(
      `Promotion run for ${modelName} (registry=${config.registry.kind}, pointer=${config.registry.pointer}, min_accuracy=${thresholds.min_accuracy}, min_f1=${thresholds.min_f1})`
    );
    const holdout = loadHoldout(config.holdout.path, config.holdout.labelColumn);
    const result = await runPromotion(
      {
        registry: registry.client,
        audit: audit.client,
        holdout,
        logger,
        notifier: createReloadNotifier(config),
      },
      { model_name: modelName, thresholds }
    );

    logger.info(`Decision: ${result.decision.outcome}`, {
      candidate_version: result.candidate.version,
      champion_version: result.champion ? result.champion.version : null,
      reasons: result.decision.reasons,
      audit: result.audit.location,
    });
    if (args.json) {
      console.log(JSON.stringify(result, null, 2));
    }
  } finally {
    audit.close();
    registry.close();
  }
}

main().catch((error: unknown) => {
  const logger = createLogger("promote");
  const failure = toRunFailureArtifact(error);
  logger.fatal(`${failure.code}: ${failure.reason} | next: ${failure.next_action}`, { failure });
  process.exitCode = 1;
});
