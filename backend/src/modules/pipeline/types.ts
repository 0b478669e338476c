/**
 * Engine-wide record and audit types.
 * Input records arrive already mapped to master field names; values stay strings/numbers as read.
 */

export type FieldValue = string | number | null;

export type ShelfRecord = {
  id: string;
  fields: Record<string, FieldValue>;
};

/** One upstream file: ordered records plus the market tag that scopes brand lookups. */
export type SourceFile = {
  sourceName: string;
  market: string;
  records: ShelfRecord[];
};

export type ResolutionSource = "rule" | "authority" | "external" | "unresolved";

/** Per-field state after the deterministic stages. Absent entry = nothing to decide (pass-through or blank). */
export type FieldOutcome =
  | { status: "resolved"; source: "rule" | "authority"; value: string; original: string; rationale: string }
  | { status: "unresolved"; original: string; reason: string };

/** Append-only audit entry; `value` is "" when the field ends blank. */
export type ResolutionRecord = {
  sourceName: string;
  recordId: string;
  field: string;
  original: string;
  value: string;
  source: ResolutionSource;
  rationale: string;
};

/** Brand authority overwrote a field whose other evidence says something else. Never blocks the write. */
export type ConflictFlag = {
  sourceName: string;
  recordId: string;
  field: string;
  brand: string;
  score: number;
  authoritySource: string;
  authorityValue: string;
  evidenceSource: string;
  evidenceValue: string;
};

export type FlaggedItem = {
  /** Unique within one file run; the reference the inference response must echo. */
  itemId: number;
  recordId: string;
  field: string;
  originalValue: string;
  identity: Record<string, string>;
  context: Record<string, string>;
  /** null for free-form fields */
  validValues: readonly string[] | null;
};
