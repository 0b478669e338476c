import fs from "node:fs";
import path from "node:path";
import { AppError, errorMessage } from "../../libs/errors.js";
import type {
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

// Looked up under the working directory; the built dist/ tree carries no data files.
const referenceDirCandidates = [
  path.resolve(process.cwd(), "backend", "data"),
  path.resolve(process.cwd(), "data"),
];

export const DEFAULT_REFERENCE_DATA_DIR =
  referenceDirCandidates.find((p) => fs.existsSync(path.join(p, "schema.json"))) ?? path.resolve(process.cwd(), "backend", "data");

const SCHEMA_FILE = "schema.json";
const TABLES_FILE = "normalization-tables.json";
const RULES_FILE = "field-rules.json";
const BRANDS_FILE = "brand-mappings.json";

function fail(file: string, message: string): never {
  throw new AppError({
    statusCode: 500,
    code: "INVALID_REFERENCE_DATA",
    message: `${file}: ${message}`,
  });
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return v != null && typeof v === "object" && !Array.isArray(v);
}

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((x) => typeof x === "string");
}

function isStringRecord(v: unknown): v is Record<string, string> {
  return isRecord(v) && Object.values(v).every((x) => typeof x === "string");
}

function readJson(dir: string, file: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(path.join(dir, file), "utf8");
  } catch (err) {
    fail(file, `cannot be read (${errorMessage(err)})`);
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    fail(file, `is not valid JSON (${errorMessage(err)})`);
  }
}

function foldKey(raw: string): string {
  return raw.trim().toLowerCase();
}

function deepFreeze<T>(value: T): T {
  if (value != null && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function parseSchema(raw: unknown): Schema {
  if (!isRecord(raw)) fail(SCHEMA_FILE, "root must be an object");
  const {
    fields,
    requiredFields,
    numericFields,
    validValues,
    freeFormFields,
    contextFields,
    identityFields,
    authority,
    unknownSentinels,
  } = raw;
  if (!isStringArray(fields) || fields.length === 0) fail(SCHEMA_FILE, "fields must be a non-empty string array");
  if (!isRecord(validValues)) fail(SCHEMA_FILE, "validValues must be an object");
  const known = new Set(fields);

  const valid: Record<string, string[]> = {};
  for (const [field, values] of Object.entries(validValues)) {
    if (!known.has(field)) fail(SCHEMA_FILE, `validValues.${field} is not a declared field`);
    if (!isStringArray(values) || values.length === 0) fail(SCHEMA_FILE, `validValues.${field} must be a non-empty string array`);
    valid[field] = values;
  }

  const subset = (name: string, v: unknown): string[] => {
    if (!isStringArray(v)) fail(SCHEMA_FILE, `${name} must be a string array`);
    const unknown = v.filter((f) => !known.has(f));
    if (unknown.length > 0) fail(SCHEMA_FILE, `${name} names undeclared fields: ${unknown.join(", ")}`);
    return v;
  };

  if (!isStringRecord(authority)) fail(SCHEMA_FILE, "authority must map role -> field name");
  const { brandField, extractionField, processingField } = authority;
  if (brandField == null || extractionField == null || processingField == null) {
    fail(SCHEMA_FILE, "authority needs brandField, extractionField and processingField");
  }
  subset("authority", [brandField, extractionField, processingField]);
  if (!valid[extractionField] || !valid[processingField]) {
    fail(SCHEMA_FILE, "authority fields must have valid-value sets");
  }
  if (!isStringArray(unknownSentinels)) fail(SCHEMA_FILE, "unknownSentinels must be a string array");

  const free = subset("freeFormFields", freeFormFields);
  if (!isRecord(numericFields)) fail(SCHEMA_FILE, "numericFields must map field -> integer | float");
  const numeric: Record<string, NumericKind> = {};
  for (const [field, kind] of Object.entries(numericFields)) {
    if (!known.has(field)) fail(SCHEMA_FILE, `numericFields.${field} is not a declared field`);
    if (kind !== "integer" && kind !== "float") fail(SCHEMA_FILE, `numericFields.${field} must be "integer" or "float"`);
    if (valid[field] || free.includes(field)) fail(SCHEMA_FILE, `numericFields.${field} is also categorical or free-form`);
    numeric[field] = kind;
  }

  return {
    fields,
    requiredFields: subset("requiredFields", requiredFields),
    numericFields: numeric,
    validValues: valid,
    freeFormFields: free,
    contextFields: subset("contextFields", contextFields),
    identityFields: subset("identityFields", identityFields),
    authority: { brandField, extractionField, processingField },
    unknownSentinels: unknownSentinels.map(foldKey),
  };
}

function targetAllows(schema: Schema, field: string, value: string): boolean {
  if (schema.freeFormFields.includes(field)) return true;
  return schema.validValues[field]?.includes(value) ?? false;
}

function parseTable(file: string, name: string, raw: unknown): NormalizationTable {
  if (!isStringRecord(raw)) fail(file, `${name} must map strings to strings`);
  const table: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    table[foldKey(key)] = value;
  }
  return table;
}

function parseTables(raw: unknown, schema: Schema): NormalizationTables {
  if (!isRecord(raw) || !isRecord(raw.tables)) fail(TABLES_FILE, "tables must be an object");
  const tables: Record<string, NormalizationTable> = {};
  for (const [field, entries] of Object.entries(raw.tables)) {
    if (!schema.validValues[field]) fail(TABLES_FILE, `tables.${field} has no valid-value set in the schema`);
    const table = parseTable(TABLES_FILE, `tables.${field}`, entries);
    for (const [key, value] of Object.entries(table)) {
      if (value !== "" && !targetAllows(schema, field, value)) {
        fail(TABLES_FILE, `tables.${field}["${key}"] maps to "${value}", which is not a valid value`);
      }
    }
    tables[field] = table;
  }
  return { tables, flavor: parseTable(TABLES_FILE, "flavor", raw.flavor ?? {}) };
}

function parsePredicate(raw: unknown, where: string, known: Set<string>): Predicate {
  if (!isRecord(raw) || typeof raw.kind !== "string") fail(RULES_FILE, `${where} must be a predicate object`);
  const field = (f: unknown): string => {
    if (typeof f !== "string" || !known.has(f)) fail(RULES_FILE, `${where} reads unknown field ${String(f)}`);
    return f;
  };
  const rawFlag = raw.raw === true ? { raw: true } : {};
  switch (raw.kind) {
    case "equals":
      if (typeof raw.value !== "string") fail(RULES_FILE, `${where}.value must be a string`);
      return { kind: "equals", field: field(raw.field), value: raw.value, ...rawFlag };
    case "contains":
      if (!isStringArray(raw.fields) || !isStringArray(raw.substrings) || raw.substrings.length === 0) {
        fail(RULES_FILE, `${where} needs fields and substrings`);
      }
      return { kind: "contains", fields: raw.fields.map(field), substrings: raw.substrings, ...rawFlag };
    case "present":
      return { kind: "present", field: field(raw.field), ...rawFlag };
    case "all":
    case "any": {
      if (!Array.isArray(raw.of) || raw.of.length === 0) fail(RULES_FILE, `${where}.of must be a non-empty array`);
      const of = raw.of.map((p: unknown, i: number) => parsePredicate(p, `${where}.of[${i}]`, known));
      return raw.kind === "all" ? { kind: "all", of } : { kind: "any", of };
    }
    case "not":
      return { kind: "not", predicate: parsePredicate(raw.predicate, `${where}.predicate`, known) };
    case "always":
      return { kind: "always" };
    default:
      fail(RULES_FILE, `${where} has unknown kind "${raw.kind}"`);
  }
}

function parsePlans(raw: unknown, schema: Schema): FieldPlan[] {
  if (!isRecord(raw) || !Array.isArray(raw.fields)) fail(RULES_FILE, "fields must be an array");
  const known = new Set(schema.fields);
  const seen = new Set<string>();
  return raw.fields.map((entry: unknown, i: number): FieldPlan => {
    const where = `fields[${i}]`;
    if (!isRecord(entry) || typeof entry.field !== "string" || !known.has(entry.field)) {
      fail(RULES_FILE, `${where}.field must name a declared field`);
    }
    const target = entry.field;
    if (seen.has(target)) fail(RULES_FILE, `${where}: duplicate plan for ${target}`);
    seen.add(target);
    if (!Array.isArray(entry.rules)) fail(RULES_FILE, `${where}.rules must be an array`);

    const rules = entry.rules.map((r: unknown, j: number): FieldRule => {
      const rw = `${where}.rules[${j}]`;
      if (!isRecord(r) || typeof r.id !== "string" || typeof r.yields !== "string") {
        fail(RULES_FILE, `${rw} needs id and yields`);
      }
      if (!targetAllows(schema, target, r.yields)) {
        fail(RULES_FILE, `${rw} yields "${r.yields}", which is not a valid ${target} value`);
      }
      return {
        id: r.id,
        description: typeof r.description === "string" ? r.description : r.id,
        when: parsePredicate(r.when, `${rw}.when`, known),
        yields: r.yields,
      };
    });

    const plan: FieldPlan = { field: target, rules };
    if (entry.flagWhenBlank !== undefined) {
      plan.flagWhenBlank = parsePredicate(entry.flagWhenBlank, `${where}.flagWhenBlank`, known);
    }
    return plan;
  });
}

function parseBrands(raw: unknown, schema: Schema): Record<string, BrandMapping[]> {
  if (!isRecord(raw) || !isRecord(raw.markets)) fail(BRANDS_FILE, "markets must be an object");
  const { extractionField, processingField } = schema.authority;
  const out: Record<string, BrandMapping[]> = {};
  for (const [market, brands] of Object.entries(raw.markets)) {
    if (!isRecord(brands)) fail(BRANDS_FILE, `markets.${market} must be an object`);
    const code = market.trim().toUpperCase();
    out[code] = Object.entries(brands).map(([brand, mapping]): BrandMapping => {
      if (!isStringRecord(mapping)) fail(BRANDS_FILE, `${market}.${brand} must map to strings`);
      const { extractionMethod, processingMethod } = mapping;
      if (extractionMethod == null || !targetAllows(schema, extractionField, extractionMethod)) {
        fail(BRANDS_FILE, `${market}.${brand}.extractionMethod is not a valid ${extractionField} value`);
      }
      if (processingMethod == null || !targetAllows(schema, processingField, processingMethod)) {
        fail(BRANDS_FILE, `${market}.${brand}.processingMethod is not a valid ${processingField} value`);
      }
      return { brand, market: code, extractionMethod, processingMethod };
    });
  }
  return out;
}

/** Read and validate every reference file under `dir`; the result is deeply frozen. */
export function loadReferenceData(dir: string = DEFAULT_REFERENCE_DATA_DIR): ReferenceData {
  const schema = parseSchema(readJson(dir, SCHEMA_FILE));
  const data: ReferenceData = {
    schema,
    tables: parseTables(readJson(dir, TABLES_FILE), schema),
    plans: parsePlans(readJson(dir, RULES_FILE), schema),
    brands: parseBrands(readJson(dir, BRANDS_FILE), schema),
  };
  return deepFreeze(data);
}
