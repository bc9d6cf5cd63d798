import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

import { ConfigError } from "../errors";

export const DEFAULT_PARAMS_PATH = path.join("config", "promotion.params.json");

const fraction = z.coerce.number().min(0).max(1);

const configSchema = z.object({
  modelName: z.string().min(1),
  productionAlias: z.string().min(1).default("champion"),
  registry: z.object({
    kind: z.enum(["mlflow", "local"]).default("local"),
    trackingUri: z.string().url().default("http://localhost:5000"),
    token: z.string().min(1).optional(),
    pointer: z.enum(["alias", "stage"]).default("alias"),
    dbPath: z.string().min(1).default(path.join("ml", "registry", "registry.db")),
    experiment: z.string().min(1).default("model_promotion"),
  }),
  gates: z.object({
    minAccuracy: fraction.default(0),
    minF1: fraction.default(0),
  }),
  holdout: z.object({
    path: z.string().min(1).default(path.join("data", "test.csv")),
    labelColumn: z.string().min(1).default("target"),
  }),
  reload: z.object({
    url: z.string().url().optional(),
    token: z.string().min(1).optional(),
    timeoutMs: z.coerce.number().int().positive().default(5_000),
  }),
  audit: z.object({
    sink: z.enum(["sqlite", "mlflow"]).default("sqlite"),
    dbPath: z.string().min(1).default(path.join("ml", "logs", "promotion_audit.db")),
    logDir: z.string().min(1).optional(),
  }),
  logDir: z.string().min(1).default("logs"),
});

export type PromotionConfig = Readonly<z.infer<typeof configSchema>>;

const paramsFileSchema = z
  .object({
    model_name: z.string().optional(),
    production_alias: z.string().optional(),
    registry: z
      .object({
        kind: z.string().optional(),
        tracking_uri: z.string().optional(),
        pointer: z.string().optional(),
        db_path: z.string().optional(),
        experiment: z.string().optional(),
      })
      .default({}),
    gates: z
      .object({
        min_accuracy: z.number().optional(),
        min_f1: z.number().optional(),
      })
      .default({}),
    holdout: z.object({ path: z.string().optional(), label_column: z.string().optional() }).default({}),
    reload: z.object({ url: z.string().optional(), timeout_ms: z.number().optional() }).default({}),
    audit: z
      .object({ sink: z.string().optional(), db_path: z.string().optional(), log_dir: z.string().optional() })
      .default({}),
    log_dir: z.string().optional(),
  })
  .default({});

type Env = Record<string, string | undefined>;

/** Empty strings count as unset. */
function envValue(env: Env, key: string): string | undefined {
  const value = env[key];
  return value !== undefined && value.trim() !== "" ? value.trim() : undefined;
}

function readParamsFile(filePath: string): z.infer<typeof paramsFileSchema> {
  if (!fs.existsSync(filePath)) return paramsFileSchema.parse(undefined);
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new ConfigError(`Params file is not valid JSON: ${filePath}`, error);
  }
  const parsed = paramsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Params file has an unexpected shape: ${filePath}: ${parsed.error.message}`);
  }
  return parsed.data;
}

export type LoadConfigOptions = {
  paramsPath?: string;
  env?: Env;
  // Reads .env into process.env first; off when an explicit env is passed.
  useDotenv?: boolean;
};

/**
 * Builds the run configuration: params file first, environment on top.
 * The result is frozen for the duration of the run.
 */
export function loadConfig(options: LoadConfigOptions = {}): PromotionConfig {
  if (options.useDotenv ?? options.env === undefined) {
    dotenv.config();
  }
  const env = options.env ?? process.env;
  const params = readParamsFile(options.paramsPath ?? DEFAULT_PARAMS_PATH);

  const raw = {
    modelName: envValue(env, "MODEL_NAME") ?? envValue(env, "MLFLOW_MODEL_NAME") ?? params.model_name,
    productionAlias: envValue(env, "PRODUCTION_ALIAS") ?? params.production_alias,
    registry: {
      kind: envValue(env, "REGISTRY_KIND") ?? params.registry.kind,
      trackingUri: envValue(env, "MLFLOW_TRACKING_URI") ?? params.registry.tracking_uri,
      token: envValue(env, "MLFLOW_TRACKING_TOKEN"),
      pointer: envValue(env, "REGISTRY_POINTER") ?? params.registry.pointer,
      dbPath: envValue(env, "REGISTRY_DB_PATH") ?? params.registry.db_path,
      experiment: envValue(env, "MLFLOW_EXPERIMENT") ?? params.registry.experiment,
    },
    gates: {
      minAccuracy: envValue(env, "PROMOTE_MIN_ACCURACY") ?? params.gates.min_accuracy,
      minF1: envValue(env, "PROMOTE_MIN_F1") ?? params.gates.min_f1,
    },
    holdout: {
      path: envValue(env, "HOLDOUT_PATH") ?? params.holdout.path,
      labelColumn: envValue(env, "HOLDOUT_LABEL_COLUMN") ?? params.holdout.label_column,
    },
    reload: {
      url: envValue(env, "API_RELOAD_URL") ?? params.reload.url,
      token: envValue(env, "API_RELOAD_TOKEN"),
      timeoutMs: envValue(env, "RELOAD_TIMEOUT_MS") ?? params.reload.timeout_ms,
    },
    audit: {
      sink: envValue(env, "AUDIT_SINK") ?? params.audit.sink,
      dbPath: envValue(env, "AUDIT_DB_PATH") ?? params.audit.db_path,
      logDir: envValue(env, "AUDIT_LOG_DIR") ?? params.audit.log_dir,
    },
    logDir: envValue(env, "LOG_DIR") ?? params.log_dir,
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid promotion config: ${issues.join("; ")}`);
  }
  return deepFreeze(parsed.data);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
