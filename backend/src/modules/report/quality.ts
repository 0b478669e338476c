/**
 * Run-level quality report handed to the report collaborator.
 * `invalidValues` re-checks every categorical output against its valid set and `invalidNumerics` every
 * numeric field against its type; anything listed in either is a bug. `missingRequired` is a data gap.
 */

import type { NumericKind, ReferenceData } from "../reference/index.js";
import type { FileResult } from "../pipeline/run.js";
import { textOf } from "../pipeline/text.js";
import type { FieldValue, ResolutionSource } from "../pipeline/types.js";

export type QualityReport = {
  totalRows: number;
  rowsPerFile: Record<string, number>;
  blanksPerField: Record<string, number>;
  invalidValues: Array<{ sourceName: string; recordId: string; field: string; value: string }>;
  invalidNumerics: Array<{ sourceName: string; recordId: string; field: string; value: string }>;
  missingRequired: Array<{ sourceName: string; recordId: string; field: string }>;
  resolutionsBySource: Record<ResolutionSource, number>;
  unresolvedCount: number;
  conflictCount: number;
  manualReview: Array<{ sourceName: string; recordId: string }>;
  inferenceAvailable: boolean;
  /** true when items stayed unresolved because inference was not available */
  resolutionPartial: boolean;
  isClean: boolean;
};

function isNumberOfKind(cell: FieldValue | undefined, kind: NumericKind): boolean {
  if (typeof cell !== "number" || !Number.isFinite(cell)) return false;
  return kind === "float" || Number.isInteger(cell);
}

export function buildQualityReport(
  files: readonly FileResult[],
  reference: ReferenceData,
  inferenceAvailable: boolean,
): QualityReport {
  const { schema } = reference;
  const report: QualityReport = {
    totalRows: 0,
    rowsPerFile: {},
    blanksPerField: Object.fromEntries(schema.fields.map((f) => [f, 0])),
    invalidValues: [],
    invalidNumerics: [],
    missingRequired: [],
    resolutionsBySource: { rule: 0, authority: 0, external: 0, unresolved: 0 },
    unresolvedCount: 0,
    conflictCount: 0,
    manualReview: [],
    inferenceAvailable,
    resolutionPartial: false,
    isClean: true,
  };

  for (const file of files) {
    report.totalRows += file.records.length;
    report.rowsPerFile[file.sourceName] = file.records.length;
    for (const record of file.records) {
      for (const field of schema.fields) {
        const cell = record.fields[field];
        const value = textOf(cell);
        const where = { sourceName: file.sourceName, recordId: record.id, field };
        if (value === "") {
          report.blanksPerField[field] = (report.blanksPerField[field] ?? 0) + 1;
          if (schema.requiredFields.includes(field)) report.missingRequired.push(where);
          continue;
        }
        const valid = schema.validValues[field];
        if (valid && !valid.includes(value)) report.invalidValues.push({ ...where, value });
        const numeric = schema.numericFields[field];
        if (numeric && !isNumberOfKind(cell, numeric)) report.invalidNumerics.push({ ...where, value });
      }
    }
    for (const r of file.resolutions) report.resolutionsBySource[r.source] += 1;
    report.unresolvedCount += file.unresolved.length;
    report.conflictCount += file.conflicts.length;
    for (const recordId of file.manualReview) report.manualReview.push({ sourceName: file.sourceName, recordId });
  }

  report.resolutionPartial = !inferenceAvailable && report.unresolvedCount > 0;
  report.isClean =
    report.invalidValues.length === 0 && report.invalidNumerics.length === 0 && report.missingRequired.length === 0;
  return report;
}
