import { MlflowAuditRecorder } from "../audit/mlflow_audit_recorder";
import { SqliteAuditRecorder } from "../audit/sqlite_audit_recorder";
import type { AuditRecorder } from "../audit/types";
import { freezeThresholds } from "../promotions/thresholds";
import type { GateThresholds } from "../promotions/thresholds";
import { LocalRegistryClient } from "../registry/local_registry";
import { MlflowRegistryClient } from "../registry/mlflow_registry";
import { MlflowTracking } from "../registry/mlflow_tracking";
import type { RegistryClient } from "../registry/types";
import { HttpReloadNotifier, noopReloadNotifier } from "../serving/reload_notifier";
import type { ReloadNotifier } from "../serving/reload_notifier";
import type { PromotionConfig } from "./config";

export type Binding<T> = {
  client: T;
  close: () => void;
};

const noop = () => undefined;

export function createRegistry(config: PromotionConfig): Binding<RegistryClient> {
  if (config.registry.kind === "mlflow") {
    return {
      client: new MlflowRegistryClient({
        trackingUri: config.registry.trackingUri,
        token: config.registry.token,
        pointer: config.registry.pointer,
        alias: config.productionAlias,
      }),
      close: noop,
    };
  }
  const local = new LocalRegistryClient({ dbPath: config.registry.dbPath, alias: config.productionAlias });
  return { client: local, close: () => local.close() };
}

export function createAuditRecorder(config: PromotionConfig): Binding<AuditRecorder> {
  if (config.audit.sink === "mlflow") {
    return {
      client: new MlflowAuditRecorder({
        trackingUri: config.registry.trackingUri,
        token: config.registry.token,
        experiment: config.registry.experiment,
      }),
      close: noop,
    };
  }
  const sqlite = new SqliteAuditRecorder({ dbPath: config.audit.dbPath, logDir: config.audit.logDir });
  return { client: sqlite, close: () => sqlite.close() };
}

/** Evaluation runs go to MLflow only when the audit sink is MLflow. */
export function createEvaluationTracking(config: PromotionConfig): MlflowTracking | null {
  if (config.audit.sink !== "mlflow") return null;
  return new MlflowTracking({
    trackingUri: config.registry.trackingUri,
    token: config.registry.token,
    experiment: config.registry.experiment,
  });
}

export function createReloadNotifier(config: PromotionConfig): ReloadNotifier {
  if (!config.reload.url) return noopReloadNotifier;
  return new HttpReloadNotifier({
    url: config.reload.url,
    token: config.reload.token,
    timeoutMs: config.reload.timeoutMs,
  });
}

export function thresholdsFromConfig(config: PromotionConfig): GateThresholds {
  return freezeThresholds({ min_accuracy: config.gates.minAccuracy, min_f1: config.gates.minF1 });
}
