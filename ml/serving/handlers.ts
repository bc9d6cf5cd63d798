import { z } from "zod";

import { toLabels } from "../evals/predictor";
import type { FeatureFrame } from "../evals/predictor";
import type { Logger } from "../logging/logger";
import type { ModelHandle } from "./model_handle";

export type HandlerResponse = {
  status: number;
  body: Record<string, unknown>;
};

const predictRequestSchema = z.object({
  records: z.array(z.record(z.string(), z.number())).min(1),
});

export class IncompleteRecordError extends Error {
  constructor(
    readonly index: number,
    readonly missing: string[]
  ) {
    super(`Record ${index} is missing features: ${missing.join(", ")}`);
    this.name = "IncompleteRecordError";
  }
}

/** Every record must carry every column any record names. */
export function recordsToFrame(records: Array<Record<string, number>>): FeatureFrame {
  const columns = Array.from(new Set(records.flatMap((record) => Object.keys(record))));
  const rows = records.map((record, index) => {
    const missing = columns.filter((column) => record[column] === undefined);
    if (missing.length > 0) {
      throw new IncompleteRecordError(index, missing);
    }
    return columns.map((column) => record[column]);
  });
  return { columns, rows };
}

export function handlePredict(handle: ModelHandle, payload: unknown, logger: Logger): HandlerResponse {
  const loaded = handle.current();
  if (!loaded) {
    return { status: 503, body: { error: "Model not loaded" } };
  }

  const parsed = predictRequestSchema.safeParse(payload);
  if (!parsed.success) {
    return { status: 400, body: { error: "Invalid request", issues: parsed.error.issues.map((i) => i.message) } };
  }

  try {
    const predictions = toLabels(loaded.predictor.predict(recordsToFrame(parsed.data.records)));
    return { status: 200, body: { predictions, model_version: loaded.version.version } };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Prediction error: ${message}`);
    return { status: 400, body: { error: message } };
  }
}

export async function handleReload(
  handle: ModelHandle,
  authorization: string | undefined,
  expectedToken: string | undefined,
  logger: Logger
): Promise<HandlerResponse> {
  if (expectedToken && authorization !== `Bearer ${expectedToken}`) {
    return { status: 401, body: { error: "Unauthorized" } };
  }
  try {
    const loaded = await handle.reload();
    logger.info(`Reloaded ${loaded.version.name} v${loaded.version.version}`);
    return { status: 200, body: { status: "reloaded", model_version: loaded.version.version } };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Reload failed: ${message}`);
    const current = handle.current();
    return {
      status: 500,
      body: { error: message, model_version: current ? current.version.version : null },
    };
  }
}
