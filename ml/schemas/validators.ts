import Ajv from "ajv";
import type { ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import auditRecordSchema from "./audit_record.schema.json";
import metricsReportSchema from "./metrics_report.schema.json";
import type { AuditRecord } from "../audit/types";
import type { Metrics } from "../evals/metrics";

const ajv = new Ajv({ allErrors: true, strict: true });
addFormats(ajv);

export const validateMetricsReport = ajv.compile<Metrics>(metricsReportSchema);
export const validateAuditRecord = ajv.compile<AuditRecord>(auditRecordSchema);

export class SchemaValidationError extends Error {
  readonly label: string;
  readonly issues: string[];

  constructor(label: string, issues: string[]) {
    super(`Schema validation failed for ${label}: ${issues.join("; ")}`);
    this.name = "SchemaValidationError";
    this.label = label;
    this.issues = issues;
  }
}

export function assertValid<T>(validate: ValidateFunction<T>, data: unknown, label: string): asserts data is T {
  const ok = validate(data);
  if (!ok) {
    const issues = validate.errors?.map((e) => `${e.instancePath || "(root)"} ${e.message ?? "is invalid"}`) ?? [];
    throw new SchemaValidationError(label, issues);
  }
}
