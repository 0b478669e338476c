/**
 * Brand authority: a brand found in the market's mapping table dictates extraction and processing method.
 * Runs after the rule cascade and overrides whatever the cascade produced for those two fields.
 * Contradicting evidence is reported as a ConflictFlag; the write happens regardless.
 */

import type { ReferenceData } from "../../reference/index.js";
import type { CascadeResult } from "../rules/index.js";
import { textOf } from "../text.js";
import type { ConflictFlag, FieldOutcome, FieldValue, ShelfRecord } from "../types.js";
import { CLAIM_TEXT_FIELDS, HPP_TREATMENT_FIELD, extractionConflict, processingConflict, type Evidence } from "./conflicts.js";
import { matchBrand, type BrandMatch } from "./match.js";

export { matchBrand, BRAND_MATCH_THRESHOLD } from "./match.js";
export type { BrandMatch } from "./match.js";
export { extractionConflict, processingConflict } from "./conflicts.js";
export type { Evidence, Contradiction } from "./conflicts.js";

export type AuthorityWrite = {
  field: string;
  previous: string;
  next: string;
};

export type AuthorityResult = CascadeResult & {
  match: BrandMatch | null;
  writes: AuthorityWrite[];
  conflicts: ConflictFlag[];
};

function outcomeValue(outcome: FieldOutcome | undefined, values: Record<string, FieldValue>, field: string): string {
  if (outcome?.status === "unresolved") return "";
  return textOf(values[field]);
}

export function applyBrandAuthority(
  record: ShelfRecord,
  ctx: { sourceName: string; market: string },
  cascade: CascadeResult,
  reference: ReferenceData,
): AuthorityResult {
  const { brandField, extractionField, processingField } = reference.schema.authority;
  const match = matchBrand(record.fields[brandField], ctx.market, reference);
  if (!match) return { ...cascade, match: null, writes: [], conflicts: [] };

  const values = { ...cascade.values };
  const outcomes = { ...cascade.outcomes };

  const evidence: Evidence = {
    hppTreatment: textOf(cascade.values[HPP_TREATMENT_FIELD]),
    processingRaw: textOf(record.fields[processingField]),
    processingPrior: outcomeValue(cascade.outcomes[processingField], cascade.values, processingField),
    extractionPrior: outcomeValue(cascade.outcomes[extractionField], cascade.values, extractionField),
    claimText: CLAIM_TEXT_FIELDS.map((f) => textOf(record.fields[f]))
      .filter((t) => t !== "")
      .join(" ")
      .toLowerCase(),
  };

  const rationale = `brand "${match.input}" matched "${match.mapping.brand}" (${match.score.toFixed(1)}) in ${match.mapping.market}`;
  const targets = [
    { field: extractionField, next: match.mapping.extractionMethod, previous: evidence.extractionPrior, detect: extractionConflict },
    { field: processingField, next: match.mapping.processingMethod, previous: evidence.processingPrior, detect: processingConflict },
  ];

  const writes: AuthorityWrite[] = [];
  const conflicts: ConflictFlag[] = [];
  for (const t of targets) {
    const contradiction = t.detect(evidence, t.next);
    if (contradiction) {
      conflicts.push({
        sourceName: ctx.sourceName,
        recordId: record.id,
        field: t.field,
        brand: match.mapping.brand,
        score: match.score,
        authoritySource: `brand mapping "${match.mapping.brand}" (${match.mapping.market})`,
        authorityValue: t.next,
        ...contradiction,
      });
    }
    values[t.field] = t.next;
    outcomes[t.field] = {
      status: "resolved",
      source: "authority",
      value: t.next,
      original: textOf(record.fields[t.field]),
      rationale,
    };
    writes.push({ field: t.field, previous: t.previous, next: t.next });
  }

  return { values, outcomes, match, writes, conflicts };
}
