/**
 * Consolidation API. Without decisions, overlapping store groups are returned for the caller to decide;
 * the caller re-posts the same files with a decision per group key.
 */

import type { FastifyInstance } from "fastify";
import type { ReferenceData } from "../reference/index.js";
import { recordSchema, toShelfRecords, type RecordBody } from "../normalize/dto.js";
import { applyOverlapDecisions, detectOverlaps, type OverlapDecision } from "./merge.js";

type ConsolidateBody = {
  files: Array<{ sourceName: string; records: RecordBody[] }>;
  master?: RecordBody[];
  decisions?: Record<string, OverlapDecision>;
};

const consolidateBodySchema = {
  type: "object",
  required: ["files"],
  properties: {
    files: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        required: ["sourceName", "records"],
        properties: {
          sourceName: { type: "string", minLength: 1 },
          records: { type: "array", items: recordSchema },
        },
      },
    },
    master: { type: "array", items: recordSchema },
    decisions: {
      type: "object",
      additionalProperties: { type: "string", enum: ["replace", "skip"] },
    },
  },
} as const;

export async function registerConsolidationRoutes(app: FastifyInstance, deps: { reference: ReferenceData }) {
  app.post<{ Body: ConsolidateBody }>(
    "/consolidate",
    { schema: { body: consolidateBodySchema } },
    async (req) => {
      const { files, master, decisions } = req.body;
      const plan = detectOverlaps(
        files.map((f) => ({ sourceName: f.sourceName, records: toShelfRecords(f.sourceName, f.records) })),
        master ? toShelfRecords("master", master) : null,
        deps.reference.schema,
      );
      if (plan.overlaps.length > 0 && decisions == null) {
        return { requestId: req.id, status: "needs_decision" as const, overlaps: plan.overlaps };
      }
      const result = applyOverlapDecisions(plan, decisions ?? {}, req.log);
      return {
        requestId: req.id,
        status: "consolidated" as const,
        rowsPerFile: plan.rowsPerFile,
        overlaps: plan.overlaps,
        ...result,
      };
    },
  );
}
