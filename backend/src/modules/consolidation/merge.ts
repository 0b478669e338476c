/**
 * Consolidation of resolved files against an optional master set.
 * Store identity is the composite key of the schema's identity fields, trimmed and case-folded.
 * Every incoming or master row ends up either in the output or counted in the decision log.
 * Output rows carry every schema field (null when absent) and the name of the file they came from.
 */

import { AppError } from "../../libs/errors.js";
import type { PipelineLog } from "../../libs/log.js";
import { fold, textOf } from "../pipeline/text.js";
import type { FieldValue, ShelfRecord } from "../pipeline/types.js";
import type { Schema } from "../reference/index.js";

/** Provenance of rows taken from the existing master set. */
export const MASTER_SOURCE = "master";

export type IncomingFile = {
  sourceName: string;
  records: ShelfRecord[];
};

export type OverlapGroup = {
  key: string;
  /** identity values as first seen in the master */
  identity: Record<string, string>;
  masterRowCount: number;
  incomingRowCount: number;
  sourceNames: string[];
};

export type OverlapDecision = "replace" | "skip";

export type DecisionLogEntry = {
  key: string;
  decision: OverlapDecision;
  keptRecordIds: string[];
  discardedRecordIds: string[];
  discardedFrom: "master" | "incoming";
};

export type ConsolidatedRecord = ShelfRecord & { sourceName: string };

type PlannedRow = { sourceName: string; record: ShelfRecord; key: string };

export type ConsolidationPlan = {
  incoming: PlannedRow[];
  master: PlannedRow[];
  overlaps: OverlapGroup[];
  rowsPerFile: Record<string, number>;
};

export type ConsolidationResult = {
  records: ConsolidatedRecord[];
  decisionLog: DecisionLogEntry[];
  appendedCount: number;
};

export function storeKey(fields: Readonly<Record<string, FieldValue>>, identityFields: readonly string[]): string {
  return identityFields.map((f) => fold(textOf(fields[f]))).join("|");
}

type ConsolidationSchema = Pick<Schema, "fields" | "identityFields">;

function planRow(sourceName: string, record: ShelfRecord, schema: ConsolidationSchema): PlannedRow {
  const fields: Record<string, FieldValue> = Object.fromEntries(schema.fields.map((f) => [f, null]));
  Object.assign(fields, record.fields);
  return { sourceName, record: { id: record.id, fields }, key: storeKey(fields, schema.identityFields) };
}

/** Concatenate files in order and group both sides by store key; groups follow master order. */
export function detectOverlaps(
  files: readonly IncomingFile[],
  master: readonly ShelfRecord[] | null,
  schema: ConsolidationSchema,
): ConsolidationPlan {
  const { identityFields } = schema;
  const incoming = files.flatMap((f) => f.records.map((record) => planRow(f.sourceName, record, schema)));
  const rowsPerFile = Object.fromEntries(files.map((f) => [f.sourceName, f.records.length]));
  const masterRows = (master ?? []).map((record) => planRow(MASTER_SOURCE, record, schema));

  const incomingByKey = new Map<string, typeof incoming>();
  for (const row of incoming) {
    const group = incomingByKey.get(row.key) ?? [];
    group.push(row);
    incomingByKey.set(row.key, group);
  }

  const groups = new Map<string, OverlapGroup>();
  for (const row of masterRows) {
    const hits = incomingByKey.get(row.key);
    if (!hits) continue;
    const existing = groups.get(row.key);
    if (existing) {
      existing.masterRowCount += 1;
      continue;
    }
    groups.set(row.key, {
      key: row.key,
      identity: Object.fromEntries(identityFields.map((f) => [f, textOf(row.record.fields[f])])),
      masterRowCount: 1,
      incomingRowCount: hits.length,
      sourceNames: [...new Set(hits.map((h) => h.sourceName))],
    });
  }

  return { incoming, master: masterRows, overlaps: [...groups.values()], rowsPerFile };
}

/**
 * Master rows first in their original order, then incoming rows in file-then-row order.
 * "replace" drops the master rows of the group and appends the incoming ones; "skip" keeps master and drops incoming.
 */
export function applyOverlapDecisions(
  plan: ConsolidationPlan,
  decisions: Readonly<Record<string, OverlapDecision>>,
  log: PipelineLog,
): ConsolidationResult {
  const overlapKeys = new Set(plan.overlaps.map((g) => g.key));
  const missing = plan.overlaps.filter((g) => decisions[g.key] == null).map((g) => g.key);
  if (missing.length > 0) {
    throw new AppError({
      statusCode: 409,
      code: "UNDECIDED_OVERLAP",
      message: `No decision for ${missing.length} overlapping store group(s)`,
      details: { missing },
    });
  }
  const unknown = Object.keys(decisions).filter((k) => !overlapKeys.has(k));
  if (unknown.length > 0) {
    throw new AppError({
      statusCode: 400,
      code: "VALIDATION_ERROR",
      message: "Decisions given for keys that do not overlap",
      details: { unknown },
    });
  }

  const records: ConsolidatedRecord[] = [];
  for (const row of plan.master) {
    if (overlapKeys.has(row.key) && decisions[row.key] === "replace") continue;
    records.push({ ...row.record, sourceName: row.sourceName });
  }
  let appendedCount = 0;
  for (const row of plan.incoming) {
    if (overlapKeys.has(row.key) && decisions[row.key] === "skip") continue;
    records.push({ ...row.record, sourceName: row.sourceName });
    appendedCount += 1;
  }

  const decisionLog = plan.overlaps.map((group): DecisionLogEntry => {
    const decision = decisions[group.key] === "replace" ? "replace" : "skip";
    const masterIds = plan.master.filter((r) => r.key === group.key).map((r) => r.record.id);
    const incomingIds = plan.incoming.filter((r) => r.key === group.key).map((r) => r.record.id);
    const entry: DecisionLogEntry =
      decision === "replace"
        ? { key: group.key, decision, keptRecordIds: incomingIds, discardedRecordIds: masterIds, discardedFrom: "master" }
        : { key: group.key, decision, keptRecordIds: masterIds, discardedRecordIds: incomingIds, discardedFrom: "incoming" };
    log.info(
      { key: group.key, decision, kept: entry.keptRecordIds.length, discarded: entry.discardedRecordIds.length },
      "Overlap decision applied",
    );
    return entry;
  });

  return { records, decisionLog, appendedCount };
}

/** detectOverlaps + applyOverlapDecisions in one call. Without a master there is nothing to decide. */
export function consolidate(
  files: readonly IncomingFile[],
  master: readonly ShelfRecord[] | null,
  decisions: Readonly<Record<string, OverlapDecision>>,
  schema: ConsolidationSchema,
  log: PipelineLog,
): ConsolidationResult & { overlaps: OverlapGroup[] } {
  const plan = detectOverlaps(files, master, schema);
  return { ...applyOverlapDecisions(plan, decisions, log), overlaps: plan.overlaps };
}
