import type { BrandMapping, ReferenceData } from "../../reference/index.js";
import { bestMatch } from "../matching/fuzzy.js";
import { textOf } from "../text.js";
import type { FieldValue } from "../types.js";

export const BRAND_MATCH_THRESHOLD = 85;

export type BrandMatch = {
  input: string;
  mapping: BrandMapping;
  score: number;
};

/** Market-scoped: a brand from another market's table is never considered. */
export function matchBrand(
  brand: FieldValue | undefined,
  market: string,
  reference: ReferenceData,
  threshold: number = BRAND_MATCH_THRESHOLD,
): BrandMatch | null {
  const input = textOf(brand);
  if (input === "") return null;
  const candidates = reference.brands[market.trim().toUpperCase()] ?? [];
  const hit = bestMatch(input, candidates, (m) => m.brand, threshold);
  return hit ? { input, mapping: hit.candidate, score: hit.score } : null;
}
