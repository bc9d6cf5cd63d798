export type ReloadOutcome =
  | { attempted: false }
  | { attempted: true; ok: boolean; status: number }
  | { attempted: true; ok: false; error: string };

export interface ReloadNotifier {
  /** Never rejects; failures come back as an outcome. */
  notify(): Promise<ReloadOutcome>;
}

export type HttpReloadNotifierConfig = {
  url: string;
  token?: string;
  timeoutMs?: number;
};

export const DEFAULT_RELOAD_TIMEOUT_MS = 5_000;

export class HttpReloadNotifier implements ReloadNotifier {
  constructor(private readonly config: HttpReloadNotifierConfig) {}

  async notify(): Promise<ReloadOutcome> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.config.token) {
      headers.Authorization = `Bearer ${this.config.token}`;
    }
    try {
      const response = await fetch(this.config.url, {
        method: "POST",
        headers,
        body: "{}",
        signal: AbortSignal.timeout(this.config.timeoutMs ?? DEFAULT_RELOAD_TIMEOUT_MS),
      });
      // Only the status matters; release the connection without reading the body.
      await response.body?.cancel();
      return { attempted: true, ok: response.ok, status: response.status };
    } catch (error) {
      return { attempted: true, ok: false, error: error instanceof Error ? error.message : String(error) };
    }
  }
}

export const noopReloadNotifier: ReloadNotifier = {
  notify: async () => ({ attempted: false }),
};
