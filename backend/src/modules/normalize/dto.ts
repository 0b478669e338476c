/**
 * Request bodies and JSON schemas shared by the normalize and consolidate routes.
 * Record ids are optional on the wire; missing ones become "<sourceName>#<row>" (1-based).
 */

import type { FieldValue, ShelfRecord } from "../pipeline/types.js";

export type RecordBody = {
  id?: string;
  fields: Record<string, FieldValue>;
};

export type SourceFileBody = {
  sourceName: string;
  market: string;
  records: RecordBody[];
};

export type NormalizeBody = {
  sources: SourceFileBody[];
};

export const recordSchema = {
  type: "object",
  required: ["fields"],
  properties: {
    id: { type: "string", minLength: 1 },
    fields: {
      type: "object",
      additionalProperties: { type: ["string", "number", "null"] },
    },
  },
} as const;

export const normalizeBodySchema = {
  type: "object",
  required: ["sources"],
  properties: {
    sources: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        required: ["sourceName", "market", "records"],
        properties: {
          sourceName: { type: "string", minLength: 1 },
          market: { type: "string", minLength: 1 },
          records: { type: "array", items: recordSchema },
        },
      },
    },
  },
} as const;

export function toShelfRecords(sourceName: string, records: readonly RecordBody[]): ShelfRecord[] {
  return records.map((r, i) => ({ id: r.id ?? `${sourceName}#${i + 1}`, fields: r.fields }));
}
