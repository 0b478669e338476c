import { describe, expect, it } from "vitest";
import type { InferFn } from "../src/modules/pipeline/inference/index.js";
import { processSourceFile, runNormalization, type EngineDeps } from "../src/modules/pipeline/run.js";
import type { SourceFile } from "../src/modules/pipeline/types.js";
import { fakeLog, inferenceConfig, record, reference } from "./helpers.js";

const store = { Retailer: "Tesco", City: "London", "Store Format": "Supermarket" };

const source: SourceFile = {
  sourceName: "tesco_london.xlsx",
  market: "UK",
  records: [
    record("r1", {
      ...store,
      Brand: "Tropicanna",
      "Product Name": "Tropicana Orange",
      Flavor: "Orange",
      Claims: "from concentrate",
      "Branded/Private Label": "Pirvate lable",
    }),
    record("r2", { ...store, Brand: "Acme", "Product Name": "Acme Mango Smoothie", "Packaging Type": "Pouch" }),
  ],
};

// r2 yields items 1 (Flavor), 2 (Juice Extraction Method), 3 (Packaging Type)
const answers: InferFn = async () => ({
  text: JSON.stringify([
    { item: 1, value: "Mango/Passion Fruit", rationale: "product name" },
    { item: 2, value: "unknown", rationale: "no evidence" },
    { item: 3, value: "Pouch", rationale: "as written" },
  ]),
  truncated: false,
});

function deps(infer: InferFn | null): EngineDeps {
  return { reference, inference: inferenceConfig(), infer, log: fakeLog() };
}

describe("processSourceFile", () => {
  it("runs cascade, authority and inference, then writes values back", async () => {
    const result = await processSourceFile(source, deps(answers));
    const [r1, r2] = result.records;

    expect(r1?.fields["Branded/Private Label"]).toBe("Private Label");
    expect(r1?.fields["Juice Extraction Method"]).toBe("Squeezed");
    expect(r1?.fields["Processing Method"]).toBe("Pasteurized");
    expect(r1?.fields.Flavor).toBe("Orange");

    expect(r2?.fields.Flavor).toBe("Mango & Passion Fruit");
    expect(r2?.fields["Juice Extraction Method"]).toBeNull();
    expect(r2?.fields["Packaging Type"]).toBeNull();

    expect(result.resolutions.map((r) => [r.recordId, r.field, r.source, r.value])).toEqual([
      ["r1", "Store Format", "rule", "Supermarket"],
      ["r1", "Branded/Private Label", "rule", "Private Label"],
      ["r1", "Juice Extraction Method", "authority", "Squeezed"],
      ["r1", "Processing Method", "authority", "Pasteurized"],
      ["r2", "Store Format", "rule", "Supermarket"],
      ["r2", "Flavor", "external", "Mango & Passion Fruit"],
      ["r2", "Juice Extraction Method", "unresolved", ""],
      ["r2", "Packaging Type", "unresolved", ""],
    ]);
    expect(result.resolutions[6]?.rationale).toBe("blank and no rule matched; model left blank: no evidence");
    expect(result.resolutions[7]).toEqual({
      sourceName: "tesco_london.xlsx",
      recordId: "r2",
      field: "Packaging Type",
      original: "Pouch",
      value: "",
      source: "unresolved",
      rationale: 'no lookup entry or valid value matches; answer rejected: "Pouch" is not a valid Packaging Type value',
    });

    expect(result.conflicts).toHaveLength(1);
    expect(result.conflicts[0]?.recordId).toBe("r1");
    expect(result.authorityWrites).toEqual([
      { recordId: "r1", field: "Juice Extraction Method", previous: "From Concentrate", next: "Squeezed" },
      { recordId: "r1", field: "Processing Method", previous: "", next: "Pasteurized" },
    ]);
    expect(result.unresolved.map((i) => i.itemId)).toEqual([2, 3]);
    expect(result.manualReview).toEqual(["r1", "r2"]);
    expect(result.inference).toMatchObject({ available: true, skipped: false, stats: { calls: 1 } });
  });

  it("never writes a value outside the valid set or an unknown sentinel", async () => {
    const result = await processSourceFile(source, deps(answers));
    for (const r of result.resolutions) {
      const valid = reference.schema.validValues[r.field];
      if (r.value !== "" && valid) expect(valid).toContain(r.value);
      expect(r.value.toLowerCase()).not.toBe("unknown");
    }
  });

  it("leaves flagged fields blank for review when inference is unavailable", async () => {
    const result = await processSourceFile(source, deps(null));
    expect(result.inference).toMatchObject({ available: false, skipped: true });
    expect(result.records[1]?.fields.Flavor).toBeNull();
    expect(result.resolutions.filter((r) => r.source === "unresolved").map((r) => r.rationale)).toEqual([
      "blank and no rule matched; external inference not configured",
      "blank and no rule matched; external inference not configured",
      "no lookup entry or valid value matches; external inference not configured",
    ]);
  });

  it("blanks unknown markers in every field, not only categorical ones", async () => {
    const file: SourceFile = {
      sourceName: "survey.xlsx",
      market: "UK",
      records: [
        record("s1", {
          ...store,
          Flavor: "Unknown",
          "Price (Local Currency)": "unknown",
          "Packaging Size (ml)": "N/A",
          Notes: "n/a",
          Surveyor: "?",
        }),
      ],
    };
    const result = await processSourceFile(file, deps(null));
    const fields = result.records[0]?.fields;

    expect(fields?.Flavor).toBeNull();
    expect(fields?.["Price (Local Currency)"]).toBeNull();
    expect(fields?.["Packaging Size (ml)"]).toBeNull();
    expect(fields?.Notes).toBeNull();
    expect(fields?.Surveyor).toBeNull();
    expect(fields?.Retailer).toBe("Tesco");
    expect(
      result.resolutions.filter((r) => r.value === "" && r.source === "rule").map((r) => [r.field, r.rationale])
    ).toEqual([
      ["Flavor", '"Unknown" marks an unknown value'],
      ["Price (Local Currency)", '"unknown" marks an unknown value'],
      ["Packaging Size (ml)", '"N/A" marks an unknown value'],
      ["Notes", '"n/a" marks an unknown value'],
      ["Surveyor", '"?" marks an unknown value'],
    ]);
    for (const value of Object.values(fields ?? {})) {
      expect(typeof value === "string" ? value.toLowerCase() : value).not.toBe("unknown");
    }
  });

  it("writes numeric fields back as numbers and sends bad numbers to review", async () => {
    const file: SourceFile = {
      sourceName: "prices.xlsx",
      market: "UK",
      records: [
        record("p1", {
          ...store,
          "HPP Treatment": "Yes",
          "Price (Local Currency)": "£1,299.50",
          "Packaging Size (ml)": "330 ml",
          Facings: "3",
          "Shelf Levels": 5,
        }),
        record("p2", { ...store, "HPP Treatment": "Yes", Facings: "lots" }),
      ],
    };
    const result = await processSourceFile(file, deps(null));
    const [p1, p2] = result.records;

    expect(p1?.fields["Price (Local Currency)"]).toBe(1299.5);
    expect(p1?.fields["Packaging Size (ml)"]).toBe(330);
    expect(p1?.fields.Facings).toBe(3);
    expect(p1?.fields["Shelf Levels"]).toBe(5);
    expect(p2?.fields.Facings).toBeNull();

    expect(result.resolutions.find((r) => r.field === "Price (Local Currency)")?.rationale).toBe(
      'numeric cleanup: "£1,299.50" -> 1299.5',
    );
    expect(result.resolutions.find((r) => r.recordId === "p2" && r.field === "Facings")).toMatchObject({
      source: "unresolved",
      original: "lots",
      rationale: '"lots" is not a number',
    });
    expect(result.unresolved).toEqual([]);
    expect(result.manualReview).toEqual(["p2"]);
  });

  it("does not mutate the input records", async () => {
    const before = structuredClone(source);
    await processSourceFile(source, deps(answers));
    expect(source).toEqual(before);
  });

  it("returns frozen audit entries", async () => {
    const result = await processSourceFile(source, deps(null));
    expect(Object.isFrozen(result.resolutions)).toBe(true);
    expect(Object.isFrozen(result.resolutions[0])).toBe(true);
  });
});

describe("runNormalization", () => {
  it("reports a failing file and still completes the others", async () => {
    const bad: SourceFile = {
      sourceName: "bad.xlsx",
      market: "UK",
      records: [record("x", {}), record("x", {})],
    };
    const run = await runNormalization([source, bad], deps(null));

    expect(run.files.map((f) => f.sourceName)).toEqual(["tesco_london.xlsx"]);
    expect(run.errors).toEqual([{ sourceName: "bad.xlsx", message: 'bad.xlsx: duplicate record id "x"' }]);
    expect(run.report).toMatchObject({
      totalRows: 2,
      rowsPerFile: { "tesco_london.xlsx": 2 },
      resolutionsBySource: { rule: 3, authority: 2, external: 0, unresolved: 3 },
      unresolvedCount: 3,
      conflictCount: 1,
      manualReview: [
        { sourceName: "tesco_london.xlsx", recordId: "r1" },
        { sourceName: "tesco_london.xlsx", recordId: "r2" },
      ],
      inferenceAvailable: false,
      resolutionPartial: true,
      invalidValues: [],
      invalidNumerics: [],
      isClean: false,
    });
    expect(run.report.missingRequired.map((m) => `${m.recordId}:${m.field}`)).toEqual([
      "r1:Country",
      "r1:Store Name",
      "r1:Currency",
      "r2:Country",
      "r2:Store Name",
      "r2:Currency",
    ]);
    expect(run.report.blanksPerField["Juice Extraction Method"]).toBe(1);
    expect(run.report.blanksPerField.Retailer).toBe(0);
  });
});
