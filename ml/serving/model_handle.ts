import type { Predictor } from "../evals/predictor";
import type { ModelVersion } from "../registry/types";

export type LoadedModel = Readonly<{
  version: ModelVersion;
  predictor: Predictor;
  loaded_at: string;
}>;

export type ModelLoader = () => Promise<{ version: ModelVersion; predictor: Predictor }>;

/**
 * Owns the model the serving process answers with.
 *
 * Readers take the current snapshot with `current()`; `reload()` is the only
 * writer. Reloads are queued one after another and the snapshot is replaced
 * only once a load has fully succeeded, so a failed reload leaves the previous
 * model in place.
 */
export class ModelHandle {
  private snapshot: LoadedModel | null = null;
  private pending: Promise<unknown> = Promise.resolve();

  constructor(private readonly loader: ModelLoader) {}

  current(): LoadedModel | null {
    return this.snapshot;
  }

  reload(): Promise<LoadedModel> {
    const next = this.pending.then(async () => {
      const loaded = await this.loader();
      const snapshot: LoadedModel = Object.freeze({
        version: loaded.version,
        predictor: loaded.predictor,
        loaded_at: new Date().toISOString(),
      });
      this.snapshot = snapshot;
      return snapshot;
    });
    // Keep the queue alive after a failed load; the caller still sees the rejection.
    this.pending = next.catch(() => undefined);
    return next;
  }
}
