/**
 * Inference output safeguards. Model text is parsed defensively and every answer is checked
 * against the pending batch and the field's valid values; nothing unchecked reaches a record.
 */

import type { ReferenceData } from "../../reference/index.js";
import { isUnknownSentinel, normalizeFlavor } from "../cleanup.js";
import { canonicalIn } from "../text.js";
import type { FlaggedItem } from "../types.js";
import type { AcceptedAnswer, RejectedAnswer } from "./types.js";

/** Drops a comma that directly precedes `]` or `}`; commas inside string literals are left alone. */
function stripTrailingCommas(text: string): string {
  let out = "";
  let inString = false;
  let escaped = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (inString) {
      out += ch;
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    if (ch === "," && /^\s*[\]}]/.test(text.slice(i + 1))) continue;
    out += ch;
  }
  return out;
}

/**
 * Tolerates markdown fences, prose around the array and trailing commas.
 * Returns null if no JSON array can be recovered.
 */
export function parseInferenceResponse(raw: string | null | undefined): unknown[] | null {
  if (raw == null) return null;
  let text = raw.trim().replace(/^```(?:json)?\s*/i, "").replace(/\s*```$/, "");
  const start = text.indexOf("[");
  const end = text.lastIndexOf("]");
  if (start === -1 || end <= start) return null;
  text = stripTrailingCommas(text.slice(start, end + 1));
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  return Array.isArray(parsed) ? parsed : null;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return v != null && typeof v === "object" && !Array.isArray(v);
}

function itemRef(v: unknown): number | null {
  if (typeof v === "number" && Number.isInteger(v)) return v;
  if (typeof v === "string" && /^\s*\d+\s*$/.test(v)) return Number(v);
  return null;
}

export type ValidatedAnswers = {
  accepted: AcceptedAnswer[];
  blank: AcceptedAnswer[];
  rejected: RejectedAnswer[];
};

export function validateAnswers(
  entries: readonly unknown[],
  batch: readonly FlaggedItem[],
  reference: ReferenceData,
): ValidatedAnswers {
  const pending = new Map(batch.map((i) => [i.itemId, i]));
  const answered = new Set<number>();
  const out: ValidatedAnswers = { accepted: [], blank: [], rejected: [] };

  for (const entry of entries) {
    if (!isRecord(entry)) {
      out.rejected.push({ itemId: null, value: "", reason: "entry is not an object" });
      continue;
    }
    const itemId = itemRef(entry.item);
    const rawValue = entry.value;
    const value = typeof rawValue === "string" ? rawValue.trim() : typeof rawValue === "number" ? String(rawValue) : null;
    const rationale = typeof entry.rationale === "string" ? entry.rationale.trim() : "";

    if (itemId == null) {
      out.rejected.push({ itemId: null, value: value ?? "", reason: "missing item reference" });
      continue;
    }
    const item = pending.get(itemId);
    if (!item) {
      out.rejected.push({ itemId, value: value ?? "", reason: "item reference does not match a pending item" });
      continue;
    }
    if (answered.has(itemId)) {
      out.rejected.push({ itemId, value: value ?? "", reason: "duplicate answer for item" });
      continue;
    }
    if (value == null && rawValue != null) {
      out.rejected.push({ itemId, value: "", reason: "value is not a string" });
      continue;
    }
    answered.add(itemId);

    const base = { itemId, field: item.field, recordId: item.recordId, rationale };
    if (value == null || value === "" || isUnknownSentinel(value, reference)) {
      out.blank.push({ ...base, value: "" });
      continue;
    }
    if (item.validValues == null) {
      const flavor = normalizeFlavor(value, reference);
      if (flavor === "") out.blank.push({ ...base, value: "" });
      else out.accepted.push({ ...base, value: flavor });
      continue;
    }
    const canonical = canonicalIn(item.validValues, value);
    if (canonical == null) {
      out.rejected.push({ itemId, value, reason: `"${value}" is not a valid ${item.field} value` });
      continue;
    }
    out.accepted.push({ ...base, value: canonical });
  }
  return out;
}
