import type { FieldError } from "./problem.js";

export function asString(v: unknown): string | undefined {
  return typeof v === "string" && v.length > 0 ? v : undefined;
}

/** Parses a base-10 integer, rejecting fractions and trailing junk. */
export function asInt(v: unknown): number | undefined {
  if (typeof v === "number") return Number.isInteger(v) ? v : undefined;
  if (typeof v !== "string" || !/^-?\d+$/.test(v.trim())) return undefined;
  return Number.parseInt(v, 10);
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}
