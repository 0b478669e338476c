export { loadReferenceData, DEFAULT_REFERENCE_DATA_DIR } from "./load.js";
export type {
  AuthorityFields,
  BrandMapping,
  FieldPlan,
  FieldRule,
  NormalizationTable,
  NormalizationTables,
  NumericKind,
  Predicate,
  ReferenceData,
  Schema,
} from "./types.js";
