import { describe, expect, it } from "vitest";
import {
  BreakCalcError,
  createMaterialCatalog,
  DEFAULT_MATERIAL_CATALOG,
  loadOverrides,
} from "../modules/breaking";

const failureOf = (fn: () => unknown): BreakCalcError => {
  try {
    fn();
  } catch (err) {
    if (err instanceof BreakCalcError) return err;
    throw err;
  }
  throw new Error("expected a BreakCalcError");
};

describe("material catalog defaults", () => {
  it("ships pine, paulownia and concrete", () => {
    expect(DEFAULT_MATERIAL_CATALOG.names()).toEqual(["pine", "paulownia", "concrete"]);
    expect(DEFAULT_MATERIAL_CATALOG.resolve("pine")).toEqual({
      name: "pine",
      singleLayerForce_lbf: 200,
      mass_kg: 0.8,
      mechanicalClass: "flexible",
    });
    expect(DEFAULT_MATERIAL_CATALOG.resolve("paulownia").mechanicalClass).toBe("flexible");
    expect(DEFAULT_MATERIAL_CATALOG.resolve("concrete")).toMatchObject({
      singleLayerForce_lbf: 500,
      mass_kg: 5.5,
      mechanicalClass: "brittle",
    });
  });

  it("resolves names case-insensitively", () => {
    expect(DEFAULT_MATERIAL_CATALOG.resolve("  Pine ").name).toBe("pine");
    expect(DEFAULT_MATERIAL_CATALOG.has("CONCRETE")).toBe(true);
  });

  it("fails on unknown names", () => {
    const err = failureOf(() => DEFAULT_MATERIAL_CATALOG.resolve("oak"));
    expect(err.kind).toBe("UNKNOWN_MATERIAL");
    expect(err.message).toContain('"oak"');
  });

  it("keeps entries immutable", () => {
    const pine = DEFAULT_MATERIAL_CATALOG.resolve("pine");
    expect(Object.isFrozen(pine)).toBe(true);
    expect(Object.isFrozen(DEFAULT_MATERIAL_CATALOG)).toBe(true);
  });
});

describe("material overrides", () => {
  it("replaces known materials wholesale and adds new ones", () => {
    const overrides = loadOverrides({
      pine: { F1: 250, m: 0.9, type: "brittle" },
      Oak: { F1: 320, m: 1.1, type: "flexible" },
    });
    const catalog = createMaterialCatalog(overrides);

    expect(catalog.names()).toEqual(["pine", "paulownia", "concrete", "oak"]);
    expect(catalog.resolve("pine")).toEqual({
      name: "pine",
      singleLayerForce_lbf: 250,
      mass_kg: 0.9,
      mechanicalClass: "brittle",
    });
    expect(catalog.resolve("oak").singleLayerForce_lbf).toBe(320);
    // defaults are untouched
    expect(DEFAULT_MATERIAL_CATALOG.resolve("pine").singleLayerForce_lbf).toBe(200);
  });

  it("rejects a definition missing a field", () => {
    const err = failureOf(() => loadOverrides({ pine: { F1: 250, type: "flexible" } }));
    expect(err.kind).toBe("INVALID_MATERIAL_DEFINITION");
    expect(err.message).toContain("pine.m");
  });

  it("rejects non-positive and non-numeric values", () => {
    expect(failureOf(() => loadOverrides({ a: { F1: 0, m: 1, type: "flexible" } })).kind).toBe(
      "INVALID_MATERIAL_DEFINITION",
    );
    expect(failureOf(() => loadOverrides({ a: { F1: 10, m: -1, type: "brittle" } })).kind).toBe(
      "INVALID_MATERIAL_DEFINITION",
    );
    expect(failureOf(() => loadOverrides({ a: { F1: "200", m: 1, type: "brittle" } })).kind).toBe(
      "INVALID_MATERIAL_DEFINITION",
    );
  });

  it("rejects an unknown mechanical class", () => {
    const err = failureOf(() => loadOverrides({ glass: { F1: 40, m: 0.3, type: "shattery" } }));
    expect(err.kind).toBe("INVALID_MATERIAL_DEFINITION");
    expect(err.message).toContain("glass.type");
  });

  it("rejects sources that are not a mapping", () => {
    expect(failureOf(() => loadOverrides(null)).kind).toBe("INVALID_MATERIAL_DEFINITION");
    expect(failureOf(() => loadOverrides([1, 2])).kind).toBe("INVALID_MATERIAL_DEFINITION");
  });

  it("rejects blank material names", () => {
    const err = failureOf(() => loadOverrides({ "  ": { F1: 40, m: 0.3, type: "brittle" } }));
    expect(err.kind).toBe("INVALID_MATERIAL_DEFINITION");
  });

  it("rejects keys that name the same material", () => {
    const err = failureOf(() =>
      loadOverrides({
        Oak: { F1: 300, m: 0.9, type: "flexible" },
        oak: { F1: 310, m: 0.9, type: "flexible" },
      }),
    );
    expect(err.kind).toBe("INVALID_MATERIAL_DEFINITION");
    expect(err.message).toBe('duplicate material name "oak" from keys "Oak" and "oak"');
  });
});
