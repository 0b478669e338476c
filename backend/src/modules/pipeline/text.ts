import type { FieldValue } from "./types.js";

export function textOf(value: FieldValue | undefined): string {
  if (value == null) return "";
  if (typeof value === "number") return Number.isFinite(value) ? String(value) : "";
  return value.trim();
}

export function fold(value: string): string {
  return value.trim().toLowerCase();
}

export function isBlank(value: FieldValue | undefined): boolean {
  return textOf(value) === "";
}

/** Canonical spelling from `valid` matching `value` case-insensitively, or null. */
export function canonicalIn(valid: readonly string[], value: string): string | null {
  const key = fold(value);
  if (key === "") return null;
  return valid.find((v) => fold(v) === key) ?? null;
}
