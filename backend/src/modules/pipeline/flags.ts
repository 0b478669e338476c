import type { ReferenceData } from "../reference/index.js";
import { textOf } from "./text.js";
import type { FieldOutcome, FieldValue, FlaggedItem, ShelfRecord } from "./types.js";

export type RecordState = {
  record: ShelfRecord;
  values: Record<string, FieldValue>;
  outcomes: Record<string, FieldOutcome>;
};

/** Resolved value when there is one, otherwise what arrived. Blank entries are omitted. */
function pick(fields: readonly string[], state: RecordState): Record<string, string> {
  const out: Record<string, string> = {};
  for (const f of fields) {
    const v = textOf(state.values[f]) || textOf(state.record.fields[f]);
    if (v !== "") out[f] = v;
  }
  return out;
}

/**
 * Every still-unresolved field, in record order then schema field order.
 * Item ids are sequential from 1 and unique within the call.
 * Numbers that failed to parse go to manual review only; the model is never asked for one.
 */
export function collectFlaggedItems(states: readonly RecordState[], reference: ReferenceData): FlaggedItem[] {
  const { schema } = reference;
  const items: FlaggedItem[] = [];
  for (const state of states) {
    for (const field of schema.fields) {
      const outcome = state.outcomes[field];
      if (outcome?.status !== "unresolved" || schema.numericFields[field]) continue;
      items.push({
        itemId: items.length + 1,
        recordId: state.record.id,
        field,
        originalValue: outcome.original,
        identity: pick(schema.identityFields, state),
        context: pick(schema.contextFields, state),
        validValues: schema.freeFormFields.includes(field) ? null : (schema.validValues[field] ?? null),
      });
    }
  }
  return items;
}
