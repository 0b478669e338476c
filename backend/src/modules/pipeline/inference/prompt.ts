/**
 * Prompts for resolving flagged fields. Only fields present in the batch get their valid values and
 * instructions, which keeps small batches short.
 */

import type { FlaggedItem } from "../types.js";

export const SYSTEM_PROMPT = `You clean supermarket shelf observation data for chilled juice, smoothie and shot products.
Each item is one field of one shelf record that could not be standardized automatically.
Use the item's original value, its field, and the other fields of the record (context) to decide.
Return only values from the allowed list for that field. Free-form fields take a short clean text value.
If the information is genuinely not determinable, return an empty string. Never return "Unknown".
Reply with a JSON array only. No markdown, no commentary.`;

const FIELD_INSTRUCTIONS: Record<string, string> = {
  "Juice Extraction Method": `- Juice Extraction Method: how the juice was extracted.
  "Cold Pressed" for HPP products and products described as cold pressed.
  "From Concentrate" when claims or notes say "from concentrate" (and not "not from concentrate").
  "Squeezed" for freshly squeezed or not-from-concentrate juice.
  "NA/Centrifugal" only when the product is clearly not pressed, squeezed or made from concentrate.
  Leave empty when the context gives no hint.`,
  "Processing Method": `- Processing Method: "HPP" when the product is high pressure processed, "Pasteurized" for heat-treated products.
  A cold pressed product is not necessarily HPP; leave empty unless the context says which.`,
  Flavor: `- Flavor: the flavor named in the product name or sub-brand, in title case, ingredients joined with " & ".
  Drop brand words, sizes and product type words (e.g. "Innocent Orange Juice 900ml" -> "Orange").
  Leave empty when the product has no flavor (e.g. an unflavored shot named only by its function).`,
  "Shelf Location": `- Shelf Location: where in the store the product sits. "Meal Deal Section" for meal deal fridges,
  "To-Go Section" for grab-and-go fridges, "Chilled Section" for the main chilled aisle.`,
  "Need State": `- Need State: "Functional" for products sold on a health benefit (immunity, energy, gut health), otherwise "Indulgence".`,
};

function fieldsIn(items: readonly FlaggedItem[]): string[] {
  return [...new Set(items.map((i) => i.field))];
}

export function buildUserPrompt(items: readonly FlaggedItem[]): string {
  const fields = fieldsIn(items);

  const allowed = fields
    .map((field) => {
      const valid = items.find((i) => i.field === field)?.validValues;
      return valid ? `- ${field}: ${valid.map((v) => JSON.stringify(v)).join(", ")}` : `- ${field}: free text`;
    })
    .join("\n");

  const instructions = fields
    .map((f) => FIELD_INSTRUCTIONS[f])
    .filter((s): s is string => s != null)
    .join("\n");

  const payload = items.map((i) => ({
    item: i.itemId,
    field: i.field,
    original_value: i.originalValue,
    identity: i.identity,
    context: i.context,
  }));

  return [
    "ALLOWED VALUES",
    allowed,
    instructions ? `\nFIELD INSTRUCTIONS\n${instructions}` : "",
    "\nITEMS",
    JSON.stringify(payload, null, 2),
    '\nRespond with a JSON array containing one object per item: {"item": <item number>, "value": "<value or empty string>", "rationale": "<short reason>"}',
  ]
    .filter((s) => s !== "")
    .join("\n");
}
