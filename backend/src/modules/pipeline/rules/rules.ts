/**
 * Table lookup and ordered rule cascade over one record. Pure functions; same input, same output.
 *
 * Pass 1 looks at every non-blank value:
 *  - categorical fields go through the lookup table, then a case-insensitive match against the valid set.
 *    A table entry of "" means "known to be blank"; the rules below still get a chance to fill it.
 *    No match at all leaves the field unresolved with its original value.
 *  - an unknown marker ("n/a", "unknown", ...) is known to be blank, whatever the field.
 *  - numeric fields are cleaned to numbers; free-form fields get the flavor rewrite.
 *  - anything else passes through as it arrived.
 * Pass 2 runs the plans in order for fields still blank: first matching rule wins, and a blank field is
 * unresolved only when the plan's flagWhenBlank predicate holds.
 *
 * Unresolved values are never written into the working values, so later rules only see canonical text.
 */

import { assertUnreachable } from "../../../libs/errors.js";
import type { FieldPlan, Predicate, ReferenceData } from "../../reference/index.js";
import { isUnknownSentinel, normalizeFlavor, toNumber } from "../cleanup.js";
import { canonicalIn, fold, textOf } from "../text.js";
import type { FieldOutcome, FieldValue, ShelfRecord } from "../types.js";
import type { CascadeResult, RuleInput } from "./types.js";

export function evaluatePredicate(p: Predicate, input: RuleInput): boolean {
  switch (p.kind) {
    case "equals": {
      const v = textOf((p.raw ? input.raw : input.resolved)[p.field]);
      return v !== "" && fold(v) === fold(p.value);
    }
    case "contains": {
      const source = p.raw ? input.raw : input.resolved;
      const text = p.fields
        .map((f) => textOf(source[f]))
        .filter((t) => t !== "")
        .join(" ")
        .toLowerCase();
      if (text === "") return false;
      return p.substrings.some((s) => text.includes(s.toLowerCase()));
    }
    case "present":
      return textOf((p.raw ? input.raw : input.resolved)[p.field]) !== "";
    case "all":
      return p.of.every((q) => evaluatePredicate(q, input));
    case "any":
      return p.of.some((q) => evaluatePredicate(q, input));
    case "not":
      return !evaluatePredicate(p.predicate, input);
    case "always":
      return true;
    default:
      return assertUnreachable(p);
  }
}

type Lookup =
  | { kind: "canonical"; value: string; rationale: string }
  | { kind: "blank"; rationale: string }
  | { kind: "miss" };

export function lookupValue(field: string, raw: string, reference: ReferenceData): Lookup {
  const table = reference.tables.tables[field];
  const mapped = table?.[fold(raw)];
  if (mapped != null) {
    return mapped === ""
      ? { kind: "blank", rationale: `lookup table maps "${raw}" to blank` }
      : { kind: "canonical", value: mapped, rationale: `lookup table maps "${raw}" to "${mapped}"` };
  }
  const valid = reference.schema.validValues[field];
  const canonical = valid ? canonicalIn(valid, raw) : null;
  if (canonical != null) return { kind: "canonical", value: canonical, rationale: "already a valid value" };
  return { kind: "miss" };
}

function isCategorical(field: string, reference: ReferenceData): boolean {
  return reference.schema.validValues[field] != null || reference.tables.tables[field] != null;
}

/** Schema fields first, then any extra columns in the order they arrived. */
function fieldOrder(record: ShelfRecord, reference: ReferenceData): string[] {
  const declared = new Set(reference.schema.fields);
  return [...reference.schema.fields, ...Object.keys(record.fields).filter((f) => !declared.has(f))];
}

/** Runs every field in schema order, so rules may read fields resolved earlier in the same record. */
export function resolveByRules(record: ShelfRecord, reference: ReferenceData): CascadeResult {
  const { schema } = reference;
  const plans = new Map(reference.plans.map((p) => [p.field, p]));
  const values: Record<string, FieldValue> = { ...record.fields };
  const outcomes: Record<string, FieldOutcome> = {};
  const resolved = (field: string, value: string, original: string, rationale: string) => {
    outcomes[field] = { status: "resolved", source: "rule", value, original, rationale };
  };

  // Pass 1: per-field cleanup and lookup. Known blanks stay open to the rule plans.
  const knownBlank = new Map<string, string>();
  for (const field of fieldOrder(record, reference)) {
    const raw = textOf(record.fields[field]);
    const categorical = isCategorical(field, reference) && !schema.freeFormFields.includes(field);
    if (raw === "") {
      if (categorical || plans.has(field) || schema.numericFields[field]) values[field] = null;
      continue;
    }

    if (categorical) {
      const found = lookupValue(field, raw, reference);
      switch (found.kind) {
        case "canonical":
          values[field] = found.value;
          resolved(field, found.value, raw, found.rationale);
          break;
        case "blank":
          values[field] = null;
          knownBlank.set(field, found.rationale);
          break;
        case "miss":
          values[field] = null;
          if (isUnknownSentinel(raw, reference)) knownBlank.set(field, `"${raw}" marks an unknown value`);
          else outcomes[field] = { status: "unresolved", original: raw, reason: "no lookup entry or valid value matches" };
          break;
        default:
          assertUnreachable(found);
      }
      continue;
    }

    if (isUnknownSentinel(raw, reference)) {
      values[field] = null;
      knownBlank.set(field, `"${raw}" marks an unknown value`);
      continue;
    }

    const numeric = schema.numericFields[field];
    if (numeric) {
      const n = toNumber(record.fields[field], numeric);
      values[field] = n;
      if (n == null) outcomes[field] = { status: "unresolved", original: raw, reason: `"${raw}" is not a number` };
      else if (String(n) !== raw) resolved(field, String(n), raw, `numeric cleanup: "${raw}" -> ${n}`);
      continue;
    }

    if (schema.freeFormFields.includes(field)) {
      const cleaned = normalizeFlavor(raw, reference);
      if (cleaned === "") {
        values[field] = null;
        knownBlank.set(field, `flavor table maps "${raw}" to blank`);
        continue;
      }
      values[field] = cleaned;
      if (cleaned !== raw) resolved(field, cleaned, raw, `flavor cleanup: "${raw}" -> "${cleaned}"`);
    }
  }

  // Pass 2: rule plans fill blanks, in plan order.
  for (const plan of reference.plans) {
    const field = plan.field;
    if (outcomes[field] != null || textOf(values[field]) !== "") continue;
    const original = textOf(record.fields[field]);
    const input: RuleInput = { raw: record.fields, resolved: values };
    const rule = plan.rules.find((r) => evaluatePredicate(r.when, input));
    if (rule) {
      values[field] = rule.yields;
      resolved(field, rule.yields, original, `rule ${rule.id}: ${rule.description}`);
      continue;
    }
    const blankRationale = knownBlank.get(field);
    if (blankRationale != null) {
      resolved(field, "", original, blankRationale);
      continue;
    }
    if (plan.flagWhenBlank && evaluatePredicate(plan.flagWhenBlank, input)) {
      outcomes[field] = { status: "unresolved", original, reason: "blank and no rule matched" };
    }
  }

  // Known blanks on fields without a plan are still decisions worth auditing.
  for (const [field, rationale] of knownBlank) {
    if (outcomes[field] == null) resolved(field, "", textOf(record.fields[field]), rationale);
  }

  return { values, outcomes };
}
