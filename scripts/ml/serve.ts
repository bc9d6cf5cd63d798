#!/usr/bin/env node
/**
 * Serve the production champion over HTTP.
 *
 *   GET  /health   -> { status, model_version }
 *   POST /predict  -> { records: [{ feature: value }] }
 *   POST /reload   -> reloads the champion (Bearer API_RELOAD_TOKEN when set)
 *
 * Usage:
 *   npm run ml:serve -- [--port 8000]
 */

import minimist from "minimist";

import { loadConfig } from "../../ml/config/config";
import { createRegistry } from "../../ml/config/runtime";
import { toRunFailureArtifact } from "../../ml/errors";
import { createLogger } from "../../ml/logging/logger";
import { ModelHandle } from "../../ml/serving/model_handle";
import { buildServer } from "../../ml/serving/server";
import { optionalNumber, optionalString } from "./lib/args";

async function main() {
  const parsed = minimist(process.argv.slice(2), { string: ["params", "port"] });
  const config = loadConfig({ paramsPath: optionalString(parsed.params) });
  const logger = createLogger("serve", { logDir: config.logDir });
  const port = optionalNumber(parsed.port, "port") ?? optionalNumber(process.env.SERVE_PORT, "port") ?? 8000;

  const registry = createRegistry(config);
  const handle = new ModelHandle(async () => {
    const champion = await registry.client.resolveChampion(config.modelName);
    if (!champion) {
      throw new Error(`No production champion for ${config.modelName}`);
    }
    return { version: champion, predictor: await registry.client.loadPredictor(champion) };
  });

  try {
    const loaded = await handle.reload();
    logger.info(`Loaded ${loaded.version.name} v${loaded.version.version}`);
  } catch (error) {
    // The server still starts; /predict answers 503 until a reload succeeds.
    logger.error(`Initial load failed: ${error instanceof Error ? error.message : String(error)}`);
  }

  const app = buildServer(handle, { logger, reloadToken: config.reload.token });
  app.addHook("onClose", async () => registry.close());

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    app.close().catch((error: unknown) => {
      logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  await app.listen({ port, host: "0.0.0.0" });
  logger.info(`Serving ${config.modelName} on :${port}`);
}

main().catch((error: unknown) => {
  const failure = toRunFailureArtifact(error);
  createLogger("serve").fatal(`${failure.code}: ${failure.reason} | next: ${failure.next_action}`, { failure });
  process.exitCode = 1;
});
