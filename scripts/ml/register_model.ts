#!/usr/bin/env node
/**
 * Register a model.json artifact as the next version in the local registry.
 *
 * Usage:
 *   npm run ml:register -- --source models/iris/v2 [--model iris_classifier] [--tag run_id=abc]
 */

import path from "node:path";

import minimist from "minimist";

import { loadConfig } from "../../ml/config/config";
import { ConfigError, toRunFailureArtifact } from "../../ml/errors";
import { createLogger } from "../../ml/logging/logger";
import { loadLocalPredictor, resolveLocalArtifactPath } from "../../ml/registry/artifact_store";
import { LocalRegistryClient } from "../../ml/registry/local_registry";
import { optionalString } from "./lib/args";

function parseTags(raw: unknown): Record<string, string> {
  const list = Array.isArray(raw) ? raw : raw === undefined ? [] : [raw];
  const tags: Record<string, string> = {};
  for (const item of list) {
    const text = optionalString(item);
    if (!text) continue;
    const eq = text.indexOf("=");
    if (eq <= 0) {
      throw new Error(`--tag expects key=value, got "${text}"`);
    }
    tags[text.slice(0, eq)] = text.slice(eq + 1);
  }
  return tags;
}

function main() {
  const parsed = minimist(process.argv.slice(2), { string: ["params", "model", "source", "tag"] });
  const config = loadConfig({ paramsPath: optionalString(parsed.params) });
  const logger = createLogger("register", { logDir: config.logDir });

  if (config.registry.kind !== "local") {
    throw new ConfigError("register_model only writes to the local registry; set REGISTRY_KIND=local");
  }
  const source = optionalString(parsed.source);
  if (!source) {
    throw new Error("Usage: npm run ml:register -- --source <artifact dir or model.json>");
  }
  const modelName = optionalString(parsed.model) ?? config.modelName;

  // Fails with ModelLoadError before anything is written.
  const predictor = loadLocalPredictor(source);
  const registry = new LocalRegistryClient({ dbPath: config.registry.dbPath, alias: config.productionAlias });
  try {
    const artifactPath = path.resolve(resolveLocalArtifactPath(source));
    const version = registry.registerVersion(modelName, artifactPath, parseTags(parsed.tag));
    logger.info(`Registered ${modelName} v${version.version} (${predictor.classes.length} classes) from ${artifactPath}`);
  } finally {
    registry.close();
  }
}

try {
  main();
} catch (error) {
  const failure = toRunFailureArtifact(error);
  createLogger("register").fatal(`${failure.code}: ${failure.reason} | next: ${failure.next_action}`, { failure });
  process.exitCode = 1;
}
