import {
  MlflowApiError,
  emptySchema,
  mlflowJson,
  searchModelVersionsSchema,
  singleModelVersionSchema,
} from "./mlflow_http";
import type { MlflowConnection, ModelVersionPayload } from "./mlflow_http";
import { isModelStage, parseVersionNumber } from "./types";
import type { ModelVersion } from "./types";

export type PointerKind = "alias" | "stage";

const MLFLOW_INVALID_PARAMETER = "INVALID_PARAMETER_VALUE";

/** MLflow answers an unset alias with 400 INVALID_PARAMETER_VALUE rather than 404. */
function isUnsetAlias(error: unknown): boolean {
  if (!(error instanceof MlflowApiError)) return false;
  return error.notFound || (error.status === 400 && error.errorCode === MLFLOW_INVALID_PARAMETER);
}

/**
 * How a registry marks its production version. Chosen once, when the client
 * is built: newer MLflow servers use a registered-model alias, older ones
 * the "Production" stage.
 */
export interface ProductionPointer {
  readonly kind: PointerKind;
  resolve(name: string): Promise<ModelVersion | null>;
  promote(name: string, version: number): Promise<void>;
}

export function toModelVersion(payload: ModelVersionPayload): ModelVersion | null {
  const version = parseVersionNumber(payload.version);
  if (version === null) return null;
  const stage = payload.current_stage ?? "None";
  return {
    name: payload.name,
    version,
    stage: isModelStage(stage) ? stage : "None",
    aliases: payload.aliases ?? [],
    tags: Object.fromEntries((payload.tags ?? []).map((tag) => [tag.key, tag.value])),
    ...(payload.source ? { source: payload.source } : {}),
  };
}

/** The alias names exactly one version, so moving it is the whole swap. */
export class AliasPointer implements ProductionPointer {
  readonly kind = "alias";

  constructor(
    private readonly connection: MlflowConnection,
    readonly alias: string
  ) {}

  async resolve(name: string): Promise<ModelVersion | null> {
    try {
      const body = await mlflowJson(
        this.connection,
        { method: "GET", path: "/api/2.0/mlflow/registered-models/alias", query: { name, alias: this.alias } },
        singleModelVersionSchema
      );
      return toModelVersion(body.model_version);
    } catch (error) {
      if (isUnsetAlias(error)) return null;
      throw error;
    }
  }

  async promote(name: string, version: number): Promise<void> {
    await mlflowJson(
      this.connection,
      {
        method: "POST",
        path: "/api/2.0/mlflow/registered-models/alias",
        body: { name, alias: this.alias, version: String(version) },
      },
      emptySchema
    );
  }
}

/** Stage transition with archive_existing_versions archives the old holder in the same call. */
export class StagePointer implements ProductionPointer {
  readonly kind = "stage";

  constructor(private readonly connection: MlflowConnection) {}

  async resolve(name: string): Promise<ModelVersion | null> {
    let body: { model_versions: ModelVersionPayload[] };
    try {
      body = await mlflowJson(
        this.connection,
        {
          method: "POST",
          path: "/api/2.0/mlflow/registered-models/get-latest-versions",
          body: { name, stages: ["Production"] },
        },
        searchModelVersionsSchema
      );
    } catch (error) {
      // An unregistered model has no Production version.
      if (error instanceof MlflowApiError && error.notFound) return null;
      throw error;
    }
    let champion: ModelVersion | null = null;
    for (const payload of body.model_versions) {
      const version = toModelVersion(payload);
      if (version && version.stage === "Production" && (!champion || version.version > champion.version)) {
        champion = version;
      }
    }
    return champion;
  }

  async promote(name: string, version: number): Promise<void> {
    await mlflowJson(
      this.connection,
      {
        method: "POST",
        path: "/api/2.0/mlflow/model-versions/transition-stage",
        body: { name, version: String(version), stage: "Production", archive_existing_versions: true },
      },
      emptySchema
    );
  }
}

export function createProductionPointer(
  kind: PointerKind,
  connection: MlflowConnection,
  alias: string
): ProductionPointer {
  return kind === "alias" ? new AliasPointer(connection, alias) : new StagePointer(connection);
}
