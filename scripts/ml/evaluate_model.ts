#!/usr/bin/env node
/**
 * Score one registered model version on the holdout and write metrics.json.
 * With AUDIT_SINK=mlflow the metrics are also logged as an `evaluate_model` run.
 *
 * Usage:
 *   npm run ml:evaluate -- [--model iris_classifier] [--version 3] [--out ml/logs/metrics.json]
 *
 * Without --version the newest version is scored.
 */

import path from "node:path";

import minimist from "minimist";

import { loadConfig } from "../../ml/config/config";
import { createEvaluationTracking, createRegistry } from "../../ml/config/runtime";
import { loadHoldout } from "../../ml/data/holdout";
import { NoVersionsError, RegistryRequestError, toRunFailureArtifact } from "../../ml/errors";
import { logEvaluationRun } from "../../ml/evals/evaluation_run";
import { scoreModel } from "../../ml/evals/metrics";
import { METRICS_REPORT_FILE, writeMetricsReport } from "../../ml/evals/metrics_report";
import { createLogger, formatMetrics } from "../../ml/logging/logger";
import { parseVersionNumber, pickCandidate } from "../../ml/registry/types";
import { optionalString } from "./lib/args";

async function main() {
  const parsed = minimist(process.argv.slice(2), { string: ["params", "model", "version", "out"] });
  const config = loadConfig({ paramsPath: optionalString(parsed.params) });
  const logger = createLogger("evaluate", { logDir: config.logDir });
  const modelName = optionalString(parsed.model) ?? config.modelName;
  const requested = optionalString(parsed.version);
  const outPath = optionalString(parsed.out) ?? path.join(config.logDir, METRICS_REPORT_FILE);

  const registry = createRegistry(config);
  try {
    const versions = await registry.client.listVersions(modelName);
    let target = pickCandidate(versions);
    if (requested !== undefined) {
      const number = parseVersionNumber(requested);
      if (number === null) {
        throw new Error(`--version must be a positive integer, got "${requested}"`);
      }
      target = versions.find((v) => v.version === number) ?? null;
      if (!target) {
        throw new RegistryRequestError(`${modelName} v${number} is not registered`, 404);
      }
    }
    if (!target) {
      throw new NoVersionsError(modelName);
    }

    const holdout = loadHoldout(config.holdout.path, config.holdout.labelColumn);
    const predictor = await registry.client.loadPredictor(target);
    const metrics = scoreModel(predictor, holdout.features, holdout.labels);
    logger.info(`${modelName} v${target.version}: ${formatMetrics(metrics)}`, { metrics });
    writeMetricsReport(outPath, metrics);
    logger.info(`Metrics written to ${outPath}`);

    const tracking = createEvaluationTracking(config);
    if (tracking) {
      const runId = await logEvaluationRun(tracking, { modelName, version: target.version, metrics });
      logger.info(`Metrics logged to MLflow run ${runId}`);
    }
  } finally {
    registry.close();
  }
}

main().catch((error: unknown) => {
  const failure = toRunFailureArtifact(error);
  createLogger("evaluate").fatal(`${failure.code}: ${failure.reason} | next: ${failure.next_action}`, { failure });
  process.exitCode = 1;
});
