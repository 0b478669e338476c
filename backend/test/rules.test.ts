import { describe, expect, it } from "vitest";
import { evaluatePredicate, resolveByRules } from "../src/modules/pipeline/rules/index.js";
import { record, reference } from "./helpers.js";

describe("evaluatePredicate", () => {
  const input = {
    raw: { "Processing Method": "Freshly Squeezed", Claims: "" },
    resolved: { "Processing Method": null, Claims: "" },
  };

  it("never matches a blank value", () => {
    expect(evaluatePredicate({ kind: "equals", field: "Processing Method", value: "" }, input)).toBe(false);
    expect(evaluatePredicate({ kind: "contains", fields: ["Claims"], substrings: [""] }, input)).toBe(false);
    expect(evaluatePredicate({ kind: "present", field: "Processing Method" }, input)).toBe(false);
  });

  it("reads the arriving value when raw is set", () => {
    expect(
      evaluatePredicate({ kind: "equals", field: "Processing Method", value: " freshly squeezed ", raw: true }, input)
    ).toBe(true);
  });

  it("combines predicates", () => {
    const present = { kind: "present", field: "Processing Method", raw: true } as const;
    expect(evaluatePredicate({ kind: "not", predicate: present }, input)).toBe(false);
    expect(evaluatePredicate({ kind: "all", of: [present, { kind: "always" }] }, input)).toBe(true);
    expect(evaluatePredicate({ kind: "any", of: [{ kind: "not", predicate: present }] }, input)).toBe(false);
  });
});

describe("resolveByRules", () => {
  it("resolves a misspelling through the lookup table", () => {
    const { values, outcomes } = resolveByRules(record("r1", { "Branded/Private Label": "Pirvate lable" }), reference);
    expect(values["Branded/Private Label"]).toBe("Private Label");
    expect(outcomes["Branded/Private Label"]).toEqual({
      status: "resolved",
      source: "rule",
      value: "Private Label",
      original: "Pirvate lable",
      rationale: 'lookup table maps "Pirvate lable" to "Private Label"',
    });
  });

  it("accepts a valid value in any case and keeps the canonical spelling", () => {
    const { values } = resolveByRules(record("r1", { Currency: " gbp " }), reference);
    expect(values.Currency).toBe("GBP");
  });

  it("reads numeric cells as text", () => {
    const { values } = resolveByRules(record("r1", { "Shelf Level": 2 }), reference);
    expect(values["Shelf Level"]).toBe("2nd");
  });

  it("leaves an unknown value unresolved and out of the working values", () => {
    const { values, outcomes } = resolveByRules(record("r1", { "Packaging Type": "Pouch" }), reference);
    expect(values["Packaging Type"]).toBeNull();
    expect(outcomes["Packaging Type"]).toEqual({
      status: "unresolved",
      original: "Pouch",
      reason: "no lookup entry or valid value matches",
    });
  });

  it("fills blanks from a related flag", () => {
    const { values, outcomes } = resolveByRules(record("r1", { "HPP Treatment": "yes" }), reference);
    expect(values["HPP Treatment"]).toBe("Yes");
    expect(values["Processing Method"]).toBe("HPP");
    expect(values["Juice Extraction Method"]).toBe("Cold Pressed");
    expect(outcomes["Juice Extraction Method"]).toEqual({
      status: "resolved",
      source: "rule",
      value: "Cold Pressed",
      original: "",
      rationale: "rule jem-hpp-treatment: HPP Treatment = Yes",
    });
  });

  it("lets rules read the raw value of a field the table blanked", () => {
    const { values, outcomes } = resolveByRules(record("r1", { "Processing Method": "Freshly squeezed" }), reference);
    expect(values["Processing Method"]).toBeNull();
    expect(outcomes["Processing Method"]).toEqual({
      status: "resolved",
      source: "rule",
      value: "",
      original: "Freshly squeezed",
      rationale: 'lookup table maps "Freshly squeezed" to blank',
    });
    expect(values["Juice Extraction Method"]).toBe("Squeezed");
  });

  it("takes the first matching text rule", () => {
    const { values } = resolveByRules(record("r1", { Claims: "100% juice, NOT from concentrate" }), reference);
    expect(values["Juice Extraction Method"]).toBe("Squeezed");
  });

  it("flags a blank field only when the plan asks for it", () => {
    const withName = resolveByRules(record("r1", { "Product Name": "Orange Juice" }), reference);
    expect(withName.outcomes.Flavor).toEqual({ status: "unresolved", original: "", reason: "blank and no rule matched" });
    expect(withName.outcomes["Juice Extraction Method"]?.status).toBe("unresolved");

    const withoutName = resolveByRules(record("r2", {}), reference);
    expect(withoutName.outcomes.Flavor).toBeUndefined();
    expect(withoutName.outcomes["Processing Method"]).toBeUndefined();
  });

  it("passes ungoverned fields through", () => {
    const { values, outcomes } = resolveByRules(record("r1", { Retailer: "Tesco", Facings: 3 }), reference);
    expect(values.Retailer).toBe("Tesco");
    expect(values.Facings).toBe(3);
    expect(outcomes.Retailer).toBeUndefined();
    expect(outcomes.Facings).toBeUndefined();
  });

  it("cleans flavor values as they arrive", () => {
    const table = resolveByRules(record("r1", { Flavor: "strawberry banana" }), reference);
    expect(table.values.Flavor).toBe("Strawberry & Banana");
    expect(table.outcomes.Flavor).toEqual({
      status: "resolved",
      source: "rule",
      value: "Strawberry & Banana",
      original: "strawberry banana",
      rationale: 'flavor cleanup: "strawberry banana" -> "Strawberry & Banana"',
    });

    const slash = resolveByRules(record("r2", { Flavor: "Mango/Passion Fruit" }), reference);
    expect(slash.values.Flavor).toBe("Mango & Passion Fruit");

    const plain = resolveByRules(record("r3", { Flavor: "Orange" }), reference);
    expect(plain.values.Flavor).toBe("Orange");
    expect(plain.outcomes.Flavor).toBeUndefined();
  });

  it("treats an unknown marker as a known blank, still open to the rules", () => {
    const { values, outcomes } = resolveByRules(
      record("r1", { Flavor: "N/A", "Juice Extraction Method": "n/a", "HPP Treatment": "Yes" }),
      reference,
    );
    expect(values.Flavor).toBeNull();
    expect(outcomes.Flavor).toEqual({
      status: "resolved",
      source: "rule",
      value: "",
      original: "N/A",
      rationale: '"N/A" marks an unknown value',
    });
    expect(values["Juice Extraction Method"]).toBe("Cold Pressed");
  });

  it("is deterministic and does not touch its input", () => {
    const input = record("r1", { "HPP Treatment": "No", Claims: "Cold pressed", "Product Type": "smoothie" });
    const before = structuredClone(input);
    const first = resolveByRules(input, reference);
    const second = resolveByRules(input, reference);
    expect(second).toEqual(first);
    expect(input).toEqual(before);
  });
});
