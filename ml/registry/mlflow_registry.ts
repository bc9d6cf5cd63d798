import { ModelLoadError } from "../errors";
import type { Predictor } from "../evals/predictor";
import { loadLocalPredictor } from "./artifact_store";
import { MODEL_ARTIFACT_FILE, parseModelArtifact } from "./model_artifact";
import {
  MlflowApiError,
  downloadUriSchema,
  emptySchema,
  mlflowFetch,
  mlflowJson,
  searchModelVersionsSchema,
} from "./mlflow_http";
import type { MlflowConnection } from "./mlflow_http";
import { createProductionPointer, toModelVersion } from "./production_pointer";
import type { PointerKind, ProductionPointer } from "./production_pointer";
import type { ModelVersion, RegistryClient } from "./types";

export type MlflowRegistryConfig = MlflowConnection & {
  pointer: PointerKind;
  alias: string;
  pageSize?: number;
};

const MLFLOW_ARTIFACTS = /^mlflow-artifacts:(?:\/\/[^/]+)?\/(.+)$/;

export class MlflowRegistryClient implements RegistryClient {
  private readonly connection: MlflowConnection;
  private readonly pageSize: number;
  readonly pointer: ProductionPointer;

  constructor(config: MlflowRegistryConfig) {
    this.connection = { trackingUri: config.trackingUri, token: config.token, timeoutMs: config.timeoutMs };
    this.pageSize = config.pageSize ?? 200;
    this.pointer = createProductionPointer(config.pointer, this.connection, config.alias);
  }

  async listVersions(name: string): Promise<ModelVersion[]> {
    const versions: ModelVersion[] = [];
    let pageToken: string | undefined;
    do {
      const page = await mlflowJson(
        this.connection,
        {
          method: "GET",
          path: "/api/2.0/mlflow/model-versions/search",
          query: { filter: `name='${name.replace(/'/g, "\\'")}'`, max_results: this.pageSize, page_token: pageToken },
        },
        searchModelVersionsSchema
      );
      for (const payload of page.model_versions) {
        const version = toModelVersion(payload);
        if (version) versions.push(version);
      }
      pageToken = page.next_page_token || undefined;
    } while (pageToken);
    return versions;
  }

  resolveChampion(name: string): Promise<ModelVersion | null> {
    return this.pointer.resolve(name);
  }

  async loadPredictor(version: ModelVersion): Promise<Predictor> {
    let artifact_uri: string;
    try {
      ({ artifact_uri } = await mlflowJson(
        this.connection,
        {
          method: "GET",
          path: "/api/2.0/mlflow/model-versions/get-download-uri",
          query: { name: version.name, version: version.version },
        },
        downloadUriSchema
      ));
    } catch (error) {
      if (error instanceof MlflowApiError && error.notFound) {
        throw new ModelLoadError(`No artifact location registered for ${version.name} v${version.version}`, error);
      }
      throw error;
    }

    const proxied = MLFLOW_ARTIFACTS.exec(artifact_uri);
    if (proxied) {
      return this.downloadPredictor(`${proxied[1].replace(/\/$/, "")}/${MODEL_ARTIFACT_FILE}`, version);
    }
    if (artifact_uri.startsWith("file:") || artifact_uri.startsWith("/")) {
      return loadLocalPredictor(artifact_uri);
    }
    throw new ModelLoadError(
      `Unsupported artifact location for ${version.name} v${version.version}: ${artifact_uri}`
    );
  }

  async promote(name: string, version: number): Promise<void> {
    await this.pointer.promote(name, version);
  }

  async tag(name: string, version: number, key: string, value: string): Promise<void> {
    await mlflowJson(
      this.connection,
      {
        method: "POST",
        path: "/api/2.0/mlflow/model-versions/set-tag",
        body: { name, version: String(version), key, value },
      },
      emptySchema
    );
  }

  private async downloadPredictor(artifactPath: string, version: ModelVersion): Promise<Predictor> {
    const encoded = artifactPath.split("/").map(encodeURIComponent).join("/");
    try {
      const response = await mlflowFetch(this.connection, {
        method: "GET",
        path: `/api/2.0/mlflow-artifacts/artifacts/${encoded}`,
      });
      return parseModelArtifact(await response.text(), `${version.name} v${version.version}`);
    } catch (error) {
      if (error instanceof MlflowApiError && error.notFound) {
        throw new ModelLoadError(`Model artifact missing for ${version.name} v${version.version}: ${artifactPath}`, error);
      }
      throw error;
    }
  }
}
