import type { FieldError } from "./errors.js";

export function asString(v: unknown): string | undefined {
  return typeof v === "string" && v.length > 0 ? v : undefined;
}

export function oneOf<T extends string>(v: string, allowed: readonly T[]): v is T {
  return allowed.some((a) => a === v);
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}
