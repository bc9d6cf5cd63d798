import type { Predictor } from "../evals/predictor";

export type ModelStage = "None" | "Staging" | "Production" | "Archived";

export const MODEL_STAGES: readonly ModelStage[] = ["None", "Staging", "Production", "Archived"];

export type ModelVersion = {
  name: string;
  version: number;
  stage: ModelStage;
  aliases: string[];
  tags: Record<string, string>;
  source?: string;
};

/**
 * Contract the promotion core needs from a versioned model store.
 *
 * Every operation rejects with `RegistryUnavailableError` when the backing
 * store cannot be reached.
 */
export interface RegistryClient {
  /** All versions of `name`, in no particular order. */
  listVersions(name: string): Promise<ModelVersion[]>;
  /** The version holding the production pointer, or null before the first promotion. */
  resolveChampion(name: string): Promise<ModelVersion | null>;
  /** Rejects with `ModelLoadError` when the artifact is missing or corrupt. */
  loadPredictor(version: ModelVersion): Promise<Predictor>;
  /**
   * Makes `version` the sole production pointer and archives the previous
   * holder, as one atomic step from the caller's point of view.
   */
  promote(name: string, version: number): Promise<void>;
  tag(name: string, version: number, key: string, value: string): Promise<void>;
}

export function pickCandidate(versions: ModelVersion[]): ModelVersion | null {
  let best: ModelVersion | null = null;
  for (const v of versions) {
    if (!best || v.version > best.version) {
      best = v;
    }
  }
  return best;
}

export function parseVersionNumber(raw: string | number): number | null {
  const value = typeof raw === "number" ? raw : Number(raw.trim());
  if (!Number.isInteger(value) || value < 1) return null;
  return value;
}

export function isModelStage(value: string): value is ModelStage {
  return MODEL_STAGES.some((stage) => stage === value);
}
