/**
 * Value cleanup shared by the rule cascade and the inference safeguards.
 */

import type { NumericKind, ReferenceData } from "../reference/index.js";
import { fold, textOf } from "./text.js";
import type { FieldValue } from "./types.js";

const CURRENCY_SYMBOLS = /[£€$]/g;
const MILLILITRE_SUFFIX = /\s*ml\b/gi;
const THOUSANDS_SEPARATOR = /(?<=\d),(?=\d{3})/g;

export function isUnknownSentinel(value: string, reference: ReferenceData): boolean {
  return reference.schema.unknownSentinels.includes(fold(value));
}

/** Flavor table rewrite, then "a/b" becomes "a & b". */
export function normalizeFlavor(value: string, reference: ReferenceData): string {
  const mapped = reference.tables.flavor[fold(value)] ?? value.trim();
  return mapped.replace(/\s*\/\s*/g, " & ").trim();
}

/**
 * "£1,299.50" -> 1299.5, "330 ml" -> 330. Integers are rounded, floats kept to two decimals.
 * Null when nothing numeric is left.
 */
export function toNumber(value: FieldValue | undefined, kind: NumericKind): number | null {
  let n: number;
  if (typeof value === "number") {
    n = value;
  } else {
    const cleaned = textOf(value)
      .replace(CURRENCY_SYMBOLS, "")
      .replace(MILLILITRE_SUFFIX, "")
      .replace(/%/g, "")
      .replace(THOUSANDS_SEPARATOR, "")
      .trim();
    if (cleaned === "") return null;
    n = Number(cleaned);
  }
  if (!Number.isFinite(n)) return null;
  return kind === "integer" ? Math.round(n) : Math.round(n * 100) / 100;
}
