/**
 * File-level orchestration: cascade + authority per record, then flag aggregation and external
 * resolution for the whole file, then write-back. Records are never mutated; output is a new set.
 */

import type { InferenceConfig } from "../../libs/config.js";
import { AppError, errorMessage } from "../../libs/errors.js";
import type { PipelineLog } from "../../libs/log.js";
import type { ReferenceData } from "../reference/index.js";
import { buildQualityReport, type QualityReport } from "../report/index.js";
import { AuditTrail } from "./auditTrail.js";
import { applyBrandAuthority, type AuthorityWrite } from "./brandAuthority/index.js";
import { collectFlaggedItems, type RecordState } from "./flags.js";
import { resolveFlaggedItems, type ExternalResolution, type InferFn, type InferenceStats, type RejectedAnswer } from "./inference/index.js";
import { resolveByRules } from "./rules/index.js";
import type { ConflictFlag, FlaggedItem, ResolutionRecord, ShelfRecord, SourceFile } from "./types.js";

export type EngineDeps = {
  reference: ReferenceData;
  inference: InferenceConfig;
  infer: InferFn | null;
  log: PipelineLog;
};

export type FileResult = {
  sourceName: string;
  market: string;
  records: ShelfRecord[];
  resolutions: readonly ResolutionRecord[];
  conflicts: readonly ConflictFlag[];
  authorityWrites: Array<AuthorityWrite & { recordId: string }>;
  /** flagged items that every stage left blank */
  unresolved: FlaggedItem[];
  /** record ids with an unresolved field or a conflict, in record order */
  manualReview: string[];
  inference: {
    available: boolean;
    skipped: boolean;
    stats: InferenceStats;
    rejected: RejectedAnswer[];
  };
};

export type NormalizationRun = {
  files: FileResult[];
  errors: Array<{ sourceName: string; message: string }>;
  report: QualityReport;
};

export function inferenceAvailable(deps: Pick<EngineDeps, "infer" | "inference">): boolean {
  return deps.infer != null && deps.inference.enabled;
}

function itemKey(recordId: string, field: string): string {
  return `${recordId}\u0000${field}`;
}

function assertUniqueIds(source: SourceFile): void {
  const seen = new Set<string>();
  for (const r of source.records) {
    if (seen.has(r.id)) {
      throw new AppError({
        statusCode: 400,
        code: "VALIDATION_ERROR",
        message: `${source.sourceName}: duplicate record id "${r.id}"`,
      });
    }
    seen.add(r.id);
  }
}

/** Why an item the model was asked about still has no value. */
function unresolvedRationale(item: FlaggedItem, reason: string, ext: ExternalResolution): string {
  if (ext.skipped) return `${reason}; external inference not configured`;
  const blank = ext.blank.find((a) => a.itemId === item.itemId);
  if (blank) return `${reason}; model left blank${blank.rationale ? `: ${blank.rationale}` : ""}`;
  const failed = ext.failed.get(item.itemId);
  if (failed != null) return `${reason}; ${failed}`;
  const rejected = ext.rejected.find((r) => r.itemId === item.itemId);
  if (rejected) return `${reason}; answer rejected: ${rejected.reason}`;
  return `${reason}; no answer returned for item`;
}

export async function processSourceFile(source: SourceFile, deps: EngineDeps): Promise<FileResult> {
  const { reference, log } = deps;
  assertUniqueIds(source);
  const trail = new AuditTrail();
  const ctx = { sourceName: source.sourceName, market: source.market };

  const authorityWrites: FileResult["authorityWrites"] = [];
  const states: RecordState[] = source.records.map((record) => {
    const authority = applyBrandAuthority(record, ctx, resolveByRules(record, reference), reference);
    for (const c of authority.conflicts) trail.flag(c);
    for (const w of authority.writes) authorityWrites.push({ recordId: record.id, ...w });
    return { record, values: authority.values, outcomes: authority.outcomes };
  });

  const items = collectFlaggedItems(states, reference);
  log.info(
    { sourceName: source.sourceName, records: source.records.length, flagged: items.length, conflicts: trail.conflicts.length },
    "Deterministic resolution done",
  );

  const ext = await resolveFlaggedItems(items, { infer: deps.infer, config: deps.inference, reference, log });
  const itemsByKey = new Map(items.map((i) => [itemKey(i.recordId, i.field), i]));
  const accepted = new Map(ext.accepted.map((a) => [a.itemId, a]));

  const unresolved: FlaggedItem[] = [];
  const manualReview = new Set<string>(trail.conflicts.map((c) => c.recordId));
  const declared = new Set(reference.schema.fields);
  const records = states.map(({ record, values, outcomes }): ShelfRecord => {
    const fields = { ...values };
    const auditOrder = [...reference.schema.fields, ...Object.keys(outcomes).filter((f) => !declared.has(f))];
    for (const field of auditOrder) {
      const outcome = outcomes[field];
      if (!outcome) continue;
      const base = { sourceName: source.sourceName, recordId: record.id, field, original: outcome.original };
      if (outcome.status === "resolved") {
        trail.record({ ...base, value: outcome.value, source: outcome.source, rationale: outcome.rationale });
        continue;
      }
      const item = itemsByKey.get(itemKey(record.id, field));
      const answer = item ? accepted.get(item.itemId) : undefined;
      if (item && answer) {
        fields[field] = answer.value;
        trail.record({ ...base, value: answer.value, source: "external", rationale: answer.rationale || "external inference" });
        continue;
      }
      fields[field] = null;
      if (item) unresolved.push(item);
      manualReview.add(record.id);
      trail.record({
        ...base,
        value: "",
        source: "unresolved",
        rationale: item ? unresolvedRationale(item, outcome.reason, ext) : outcome.reason,
      });
    }
    return { id: record.id, fields };
  });

  return {
    sourceName: source.sourceName,
    market: source.market,
    records,
    resolutions: trail.resolutions,
    conflicts: trail.conflicts,
    authorityWrites,
    unresolved,
    manualReview: source.records.map((r) => r.id).filter((id) => manualReview.has(id)),
    inference: { available: inferenceAvailable(deps), skipped: ext.skipped, stats: ext.stats, rejected: ext.rejected },
  };
}

/** Files run concurrently; a file that throws is reported in `errors` and the rest still complete. */
export async function runNormalization(sources: readonly SourceFile[], deps: EngineDeps): Promise<NormalizationRun> {
  const settled = await Promise.allSettled(sources.map((s) => processSourceFile(s, deps)));
  const files: FileResult[] = [];
  const errors: NormalizationRun["errors"] = [];
  settled.forEach((outcome, i) => {
    const sourceName = sources[i]?.sourceName ?? `#${i + 1}`;
    if (outcome.status === "fulfilled") {
      files.push(outcome.value);
    } else {
      deps.log.error({ err: outcome.reason, sourceName }, "Source file failed");
      errors.push({ sourceName, message: errorMessage(outcome.reason) });
    }
  });
  return { files, errors, report: buildQualityReport(files, deps.reference, inferenceAvailable(deps)) };
}
