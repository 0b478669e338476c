import { describe, expect, it } from "vitest";
import { applyBrandAuthority, matchBrand } from "../src/modules/pipeline/brandAuthority/index.js";
import { resolveByRules } from "../src/modules/pipeline/rules/index.js";
import type { ShelfRecord } from "../src/modules/pipeline/types.js";
import { record, reference } from "./helpers.js";

const EXTRACTION = "Juice Extraction Method";
const PROCESSING = "Processing Method";

function run(r: ShelfRecord, market = "UK") {
  return applyBrandAuthority(r, { sourceName: "tesco.xlsx", market }, resolveByRules(r, reference), reference);
}

describe("matchBrand", () => {
  it("matches within the record's market only", () => {
    expect(matchBrand("tropicana", " uk ", reference)?.mapping.brand).toBe("Tropicana");
    expect(matchBrand("Tropicana", "FR", reference)).toBeNull();
  });

  it("does not match a blank brand", () => {
    expect(matchBrand("  ", "UK", reference)).toBeNull();
    expect(matchBrand(null, "UK", reference)).toBeNull();
  });
});

describe("applyBrandAuthority", () => {
  it("overrides the cascade and flags contradicting claims text", () => {
    const r = record("r7", { Brand: "Tropicanna", Claims: "from concentrate" });
    const result = run(r);

    expect(result.values[EXTRACTION]).toBe("Squeezed");
    expect(result.values[PROCESSING]).toBe("Pasteurized");
    expect(result.writes).toEqual([
      { field: EXTRACTION, previous: "From Concentrate", next: "Squeezed" },
      { field: PROCESSING, previous: "", next: "Pasteurized" },
    ]);
    expect(result.conflicts).toEqual([
      {
        sourceName: "tesco.xlsx",
        recordId: "r7",
        field: EXTRACTION,
        brand: "Tropicana",
        score: (18 / 19) * 100,
        authoritySource: 'brand mapping "Tropicana" (UK)',
        authorityValue: "Squeezed",
        evidenceSource: "Claims/Notes: 'from concentrate'",
        evidenceValue: "From Concentrate",
      },
    ]);
    expect(result.outcomes[EXTRACTION]).toEqual({
      status: "resolved",
      source: "authority",
      value: "Squeezed",
      original: "",
      rationale: 'brand "Tropicanna" matched "Tropicana" (94.7) in UK',
    });
  });

  it("emits at most one conflict per field, from the first contradicting check", () => {
    const r = record("r1", { Brand: "Innocent", "HPP Treatment": "Yes", Claims: "cold pressed, hpp" });
    const result = run(r);
    expect(result.conflicts.map((c) => [c.field, c.evidenceSource, c.evidenceValue])).toEqual([
      [EXTRACTION, "HPP Treatment = Yes", "Cold Pressed"],
      [PROCESSING, "HPP Treatment = Yes", "HPP"],
    ]);
  });

  it("raises nothing when the evidence agrees", () => {
    const result = run(record("r1", { Brand: "MOJU", "HPP Treatment": "Yes" }));
    expect(result.values[EXTRACTION]).toBe("Cold Pressed");
    expect(result.values[PROCESSING]).toBe("HPP");
    expect(result.conflicts).toEqual([]);
  });

  it("resolves a field the cascade could not", () => {
    const result = run(record("r1", { Brand: "Naked", [EXTRACTION]: "Blended" }));
    expect(result.outcomes[EXTRACTION]).toMatchObject({ status: "resolved", source: "authority", value: "From Concentrate", original: "Blended" });
    expect(result.writes[0]).toEqual({ field: EXTRACTION, previous: "", next: "From Concentrate" });
    expect(result.conflicts).toEqual([]);
  });

  it("leaves the cascade result alone without a match", () => {
    const r = record("r1", { Brand: "Tropicana", Claims: "from concentrate" });
    const cascade = resolveByRules(r, reference);
    const result = applyBrandAuthority(r, { sourceName: "a", market: "DE" }, cascade, reference);
    expect(result.match).toBeNull();
    expect(result.values).toEqual(cascade.values);
    expect(result.outcomes).toEqual(cascade.outcomes);
    expect(result.writes).toEqual([]);
  });
});
