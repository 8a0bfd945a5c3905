import { InvalidArgumentError, NullArgumentError } from "../errors.js";

export function requireString(value: string | null | undefined, what: string): string {
  if (value == null) throw new NullArgumentError(what);
  if (typeof value !== "string") throw new InvalidArgumentError(`${what} must be a string`);
  return value;
}

export function requireLimit(k: number): number {
  if (!Number.isInteger(k) || k < 0) {
    throw new InvalidArgumentError(`k must be a non-negative integer, got ${k}`);
  }
  return k;
}
