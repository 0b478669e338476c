/**
 * Reference data shapes. Loaded once per process from backend/data/*.json and frozen;
 * every resolver receives them explicitly, nothing reads them from module state.
 */

/**
 * Rule predicates over a record. A predicate that reads a blank field is false.
 * `raw: true` reads the value as it arrived instead of the value resolved so far in the cascade.
 */
export type Predicate =
  | { kind: "equals"; field: string; value: string; raw?: boolean }
  | { kind: "contains"; fields: string[]; substrings: string[]; raw?: boolean }
  | { kind: "present"; field: string; raw?: boolean }
  | { kind: "all"; of: Predicate[] }
  | { kind: "any"; of: Predicate[] }
  | { kind: "not"; predicate: Predicate }
  | { kind: "always" };

export type FieldRule = {
  id: string;
  description: string;
  when: Predicate;
  yields: string;
};

/** Ordered rules for one target field; first match wins. */
export type FieldPlan = {
  field: string;
  rules: readonly FieldRule[];
  /** When the field is blank and no rule matched, flag it only if this holds. */
  flagWhenBlank?: Predicate;
};

export type AuthorityFields = {
  brandField: string;
  extractionField: string;
  processingField: string;
};

/** Numeric fields hold numbers in the output; currency signs, "ml" and thousands separators are stripped on the way in. */
export type NumericKind = "integer" | "float";

export type Schema = {
  fields: readonly string[];
  /** Must be non-blank in every output record; checked by the quality report. */
  requiredFields: readonly string[];
  numericFields: Readonly<Record<string, NumericKind>>;
  validValues: Readonly<Record<string, readonly string[]>>;
  freeFormFields: readonly string[];
  contextFields: readonly string[];
  identityFields: readonly string[];
  authority: AuthorityFields;
  unknownSentinels: readonly string[];
};

/** lowercase-trimmed raw value -> canonical value; "" means resolve to blank. */
export type NormalizationTable = Readonly<Record<string, string>>;

export type NormalizationTables = {
  tables: Readonly<Record<string, NormalizationTable>>;
  /** Rewrite table for the free-form Flavor field, applied to input and model answers alike. */
  flavor: NormalizationTable;
};

export type BrandMapping = {
  brand: string;
  market: string;
  extractionMethod: string;
  processingMethod: string;
};

export type ReferenceData = {
  schema: Schema;
  tables: NormalizationTables;
  plans: readonly FieldPlan[];
  /** market code (upper case) -> mappings in declaration order */
  brands: Readonly<Record<string, readonly BrandMapping[]>>;
};
