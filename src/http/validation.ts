import type { FieldError } from "./problem.js";

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

export function asNumber(v: unknown): number | undefined {
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

export function asInt(v: unknown): number | undefined {
  return typeof v === "number" && Number.isInteger(v) ? v : undefined;
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}

/** Integer query parameter; undefined when absent, NaN when present but malformed. */
export function intParam(v: string | null): number | undefined {
  if (v === null || v === "") return undefined;
  return /^-?\d+$/.test(v) ? Number(v) : Number.NaN;
}

export function checkLimit(errors: FieldError[], path: string, k: number, maxK: number): void {
  if (!Number.isInteger(k) || k < 0 || k > maxK) pushErr(errors, path, `must be an integer between 0 and ${maxK}`);
}
