export type PromotionErrorCode =
  | "CONFIG_INVALID"
  | "HOLDOUT_MISSING"
  | "EVALUATION_FAILED"
  | "MODEL_LOAD_FAILED"
  | "REGISTRY_UNAVAILABLE"
  | "REGISTRY_REQUEST_FAILED"
  | "NO_VERSIONS"
  | "CONSISTENCY_VIOLATION"
  | "RUN_FAILED";

export type RunFailureArtifact = {
  code: PromotionErrorCode;
  reason: string;
  fatal: boolean;
  next_action: string;
};

export class PromotionRunError extends Error {
  readonly code: PromotionErrorCode;
  readonly fatal: boolean;
  readonly next_action: string;

  constructor(params: {
    code: PromotionErrorCode;
    reason: string;
    fatal?: boolean;
    next_action?: string;
    cause?: unknown;
  }) {
    super(params.reason, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = "PromotionRunError";
    this.code = params.code;
    this.fatal = params.fatal ?? true;
    this.next_action = params.next_action ?? "Inspect the run log and rerun the promotion step.";
  }

  toFailureArtifact(): RunFailureArtifact {
    return {
      code: this.code,
      reason: this.message,
      fatal: this.fatal,
      next_action: this.next_action,
    };
  }
}

export class ConfigError extends PromotionRunError {
  constructor(reason: string, cause?: unknown) {
    super({
      code: "CONFIG_INVALID",
      reason,
      cause,
      next_action: "Fix config/promotion.params.json or the overriding environment variables.",
    });
    this.name = "ConfigError";
  }
}

export class HoldoutMissingError extends PromotionRunError {
  constructor(filePath: string) {
    super({
      code: "HOLDOUT_MISSING",
      reason: `Holdout dataset not found: ${filePath}`,
      next_action: "Run the preceding pipeline stage first (data preparation must write the holdout split).",
    });
    this.name = "HoldoutMissingError";
  }
}

export class EvaluationError extends PromotionRunError {
  constructor(reason: string, cause?: unknown) {
    super({
      code: "EVALUATION_FAILED",
      reason,
      cause,
      next_action: "Check that the holdout columns match the model's feature names.",
    });
    this.name = "EvaluationError";
  }
}

export class ModelLoadError extends PromotionRunError {
  constructor(reason: string, cause?: unknown) {
    super({
      code: "MODEL_LOAD_FAILED",
      reason,
      cause,
      next_action: "Run the training stage first so the candidate artifact is registered.",
    });
    this.name = "ModelLoadError";
  }
}

export class RegistryUnavailableError extends PromotionRunError {
  constructor(reason: string, cause?: unknown) {
    super({
      code: "REGISTRY_UNAVAILABLE",
      reason,
      cause,
      next_action: "Check that the model registry is reachable and rerun.",
    });
    this.name = "RegistryUnavailableError";
  }
}

export class RegistryRequestError extends PromotionRunError {
  readonly status: number;

  constructor(reason: string, status: number) {
    super({
      code: "REGISTRY_REQUEST_FAILED",
      reason,
      next_action: "Check the registry credentials and the model name.",
    });
    this.name = "RegistryRequestError";
    this.status = status;
  }
}

export class NoVersionsError extends PromotionRunError {
  constructor(modelName: string) {
    super({
      code: "NO_VERSIONS",
      reason: `No versions found for '${modelName}'`,
      next_action: "Run the training stage first so a candidate version is registered.",
    });
    this.name = "NoVersionsError";
  }
}

export class ConsistencyError extends PromotionRunError {
  constructor(reason: string) {
    super({
      code: "CONSISTENCY_VIOLATION",
      reason,
      next_action: "Another promotion may have run concurrently for this model; inspect the registry before retrying.",
    });
    this.name = "ConsistencyError";
  }
}

export function toRunFailureArtifact(error: unknown): RunFailureArtifact {
  if (error instanceof PromotionRunError) {
    return error.toFailureArtifact();
  }
  return {
    code: "RUN_FAILED",
    reason: error instanceof Error ? error.message : String(error),
    fatal: true,
    next_action: "Review the run log and rerun the promotion step.",
  };
}
