export function optionalString(value: unknown): string | undefined {
  if (typeof value === "string" && value.trim() !== "") return value.trim();
  if (typeof value === "number") return String(value);
  return undefined;
}

export function optionalNumber(value: unknown, flag: string): number | undefined {
  const raw = optionalString(value);
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new Error(`--${flag} must be a number, got "${raw}"`);
  }
  return parsed;
}
