import { z } from "zod";

import { RegistryRequestError, RegistryUnavailableError } from "../errors";

export type MlflowConnection = {
  trackingUri: string;
  token?: string;
  timeoutMs?: number;
};

export type MlflowRequest = {
  method: "GET" | "POST" | "PATCH" | "DELETE";
  path: string;
  query?: Record<string, string | number | undefined>;
  body?: unknown;
};

const errorBodySchema = z
  .object({
    error_code: z.string().optional(),
    message: z.string().optional(),
  })
  .passthrough();

export const MLFLOW_NOT_FOUND = "RESOURCE_DOES_NOT_EXIST";

export class MlflowApiError extends RegistryRequestError {
  readonly errorCode: string | null;

  constructor(message: string, status: number, errorCode: string | null) {
    super(message, status);
    this.name = "MlflowApiError";
    this.errorCode = errorCode;
  }

  get notFound(): boolean {
    return this.status === 404 || this.errorCode === MLFLOW_NOT_FOUND;
  }
}

export function buildUrl(trackingUri: string, path: string, query?: MlflowRequest["query"]): string {
  const url = new URL(path.replace(/^\//, ""), trackingUri.endsWith("/") ? trackingUri : `${trackingUri}/`);
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url.toString();
}

async function readErrorBody(response: Response): Promise<{ code: string | null; message: string }> {
  const text = await response.text();
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      return { code: parsed.data.error_code ?? null, message: parsed.data.message ?? text };
    }
  } catch {
    // Non-JSON error page (proxy, load balancer); fall through with the raw text.
  }
  return { code: null, message: text.slice(0, 200) };
}

/**
 * Sends one request to the MLflow REST API.
 *
 * Network failures and 5xx answers raise `RegistryUnavailableError`; other
 * non-2xx answers raise `MlflowApiError` so callers can treat 404 as "absent".
 */
export async function mlflowFetch(connection: MlflowConnection, request: MlflowRequest): Promise<Response> {
  const url = buildUrl(connection.trackingUri, request.path, request.query);
  const headers: Record<string, string> = { Accept: "application/json" };
  if (request.body !== undefined) headers["Content-Type"] = "application/json";
  if (connection.token) headers.Authorization = `Bearer ${connection.token}`;

  let response: Response;
  try {
    response = await fetch(url, {
      method: request.method,
      headers,
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal: AbortSignal.timeout(connection.timeoutMs ?? 30_000),
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RegistryUnavailableError(`Registry unreachable at ${connection.trackingUri}: ${reason}`, error);
  }

  if (response.status >= 500) {
    const body = await readErrorBody(response);
    throw new RegistryUnavailableError(
      `Registry returned ${response.status} for ${request.method} ${request.path}: ${body.message}`
    );
  }
  if (!response.ok) {
    const body = await readErrorBody(response);
    throw new MlflowApiError(
      `Registry rejected ${request.method} ${request.path} (${response.status}): ${body.message}`,
      response.status,
      body.code
    );
  }
  return response;
}

export async function mlflowJson<T>(
  connection: MlflowConnection,
  request: MlflowRequest,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  const response = await mlflowFetch(connection, request);
  const text = await response.text();
  let json: unknown = {};
  if (text.trim().length > 0) {
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new RegistryUnavailableError(`Registry sent a non-JSON body for ${request.path}`, error);
    }
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new RegistryUnavailableError(
      `Registry sent an unexpected payload for ${request.path}: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")} ${issue.message}`)
        .join("; ")}`
    );
  }
  return parsed.data;
}

const tagSchema = z.object({ key: z.string(), value: z.string().default("") });

export const modelVersionPayloadSchema = z
  .object({
    name: z.string(),
    version: z.union([z.string(), z.number()]),
    current_stage: z.string().optional(),
    aliases: z.array(z.string()).optional(),
    tags: z.array(tagSchema).optional(),
    source: z.string().optional(),
  })
  .passthrough();

export type ModelVersionPayload = z.infer<typeof modelVersionPayloadSchema>;

export const searchModelVersionsSchema = z.object({
  model_versions: z.array(modelVersionPayloadSchema).default([]),
  next_page_token: z.string().optional(),
});

export const singleModelVersionSchema = z.object({
  model_version: modelVersionPayloadSchema,
});

export const downloadUriSchema = z.object({
  artifact_uri: z.string(),
});

export const emptySchema = z.object({}).passthrough();
