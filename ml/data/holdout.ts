import fs from "node:fs";
import { parse as parseCsv } from "csv-parse/sync";

import { EvaluationError, HoldoutMissingError } from "../errors";
import type { FeatureFrame, Label } from "../evals/predictor";

export type HoldoutSet = {
  features: FeatureFrame;
  labels: Label[];
  source: string;
};

export const DEFAULT_LABEL_COLUMN = "target";

function parseNumber(raw: string, column: string, line: number): number {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new EvaluationError(`Non-numeric value '${raw}' in column '${column}' on row ${line}`);
  }
  return value;
}

function toRecords(parsed: unknown): string[][] {
  if (!Array.isArray(parsed)) return [];
  return parsed.map((record: unknown) => (Array.isArray(record) ? record.map((cell: unknown) => String(cell)) : []));
}

export function parseHoldoutCsv(text: string, labelColumn = DEFAULT_LABEL_COLUMN, source = "<inline>"): HoldoutSet {
  const records = toRecords(parseCsv(text, { skip_empty_lines: true, trim: true, relax_column_count: true }));
  const [header, ...body] = records;
  if (!header) {
    throw new EvaluationError(`Holdout has no header row: ${source}`);
  }

  const labelIndex = header.indexOf(labelColumn);
  if (labelIndex < 0) {
    throw new EvaluationError(`Holdout is missing label column '${labelColumn}': ${source}`);
  }
  const columns = header.filter((_, i) => i !== labelIndex);

  const rows: number[][] = [];
  const labels: Label[] = [];
  body.forEach((record, index) => {
    const line = index + 2;
    if (record.length !== header.length) {
      throw new EvaluationError(`Row ${line} has ${record.length} cells, expected ${header.length}`);
    }
    labels.push(record[labelIndex]);
    rows.push(
      record.flatMap((cell, i) => (i === labelIndex ? [] : [parseNumber(cell, header[i], line)]))
    );
  });

  return { features: { columns, rows }, labels, source };
}

export function loadHoldout(filePath: string, labelColumn = DEFAULT_LABEL_COLUMN): HoldoutSet {
  if (!fs.existsSync(filePath)) {
    throw new HoldoutMissingError(filePath);
  }
  return parseHoldoutCsv(fs.readFileSync(filePath, "utf8"), labelColumn, filePath);
}
