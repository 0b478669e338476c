/**
 * Deterministic cascade types. Pure; no inference.
 */

import type { FieldOutcome, FieldValue } from "../types.js";

/** What a predicate reads: the record as it arrived and the values resolved so far. */
export type RuleInput = {
  raw: Readonly<Record<string, FieldValue>>;
  resolved: Readonly<Record<string, FieldValue>>;
};

export type CascadeResult = {
  /** Working values: resolved where decided, null where blank or still unresolved, raw elsewhere. */
  values: Record<string, FieldValue>;
  /** Only fields that needed a decision. */
  outcomes: Record<string, FieldOutcome>;
};
