import { MaterialOverrides, type TMaterial, type TMaterialDefinition } from "@shared/breaking";
import { BreakCalcError } from "./errors";

/**
 * Empirical single-layer breaking forces (lbf) and approximate board masses.
 *   - pine: 12x12x0.75 in board, dynamic tests average ~1,100 N
 *   - paulownia: MOR roughly 0.5-0.7 of pine
 *   - concrete: low-density 16x8x1.625 in patio slab (300-1,100 lbf range)
 */
export const DEFAULT_MATERIAL_DEFINITIONS: Readonly<Record<string, TMaterialDefinition>> = Object.freeze({
  pine: { F1: 200, m: 0.8, type: "flexible" },
  paulownia: { F1: 100, m: 0.5, type: "flexible" },
  concrete: { F1: 500, m: 5.5, type: "brittle" },
});

export interface MaterialCatalog {
  names(): string[];
  has(name: string): boolean;
  resolve(name: string): TMaterial;
}

export const normalizeMaterialName = (name: string): string => name.trim().toLowerCase();

const toMaterial = (name: string, def: TMaterialDefinition): TMaterial =>
  Object.freeze({
    name,
    singleLayerForce_lbf: def.F1,
    mass_kg: def.m,
    mechanicalClass: def.type,
  });

/**
 * Validate a parsed override mapping of name -> { F1, m, type }.
 * Every definition must be complete; there is no per-field merge.
 */
export function loadOverrides(source: unknown): Record<string, TMaterial> {
  const parsed = MaterialOverrides.safeParse(source);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? issue.path.join(".") : "(root)";
    throw new BreakCalcError(
      "INVALID_MATERIAL_DEFINITION",
      `invalid material definition at ${where}: ${issue?.message ?? "unrecognized input"}`,
    );
  }

  const materials: Record<string, TMaterial> = {};
  const rawNames = new Map<string, string>();
  for (const [rawName, def] of Object.entries(parsed.data)) {
    const name = normalizeMaterialName(rawName);
    if (!name) {
      throw new BreakCalcError("INVALID_MATERIAL_DEFINITION", "material name must not be blank");
    }
    const previous = rawNames.get(name);
    if (previous !== undefined) {
      throw new BreakCalcError(
        "INVALID_MATERIAL_DEFINITION",
        `duplicate material name "${name}" from keys "${previous}" and "${rawName}"`,
      );
    }
    rawNames.set(name, rawName);
    materials[name] = toMaterial(name, def);
  }
  return materials;
}

export function createMaterialCatalog(overrides: Record<string, TMaterial> = {}): MaterialCatalog {
  const byName = new Map<string, TMaterial>();
  for (const [name, def] of Object.entries(DEFAULT_MATERIAL_DEFINITIONS)) {
    byName.set(name, toMaterial(name, def));
  }
  for (const material of Object.values(overrides)) {
    byName.set(normalizeMaterialName(material.name), material);
  }

  const catalog: MaterialCatalog = {
    names: () => Array.from(byName.keys()),
    has: (name) => byName.has(normalizeMaterialName(name)),
    resolve: (name) => {
      const material = byName.get(normalizeMaterialName(name));
      if (!material) {
        throw new BreakCalcError(
          "UNKNOWN_MATERIAL",
          `unknown material "${name}" (known: ${Array.from(byName.keys()).join(", ")})`,
        );
      }
      return material;
    },
  };
  return Object.freeze(catalog);
}

export const DEFAULT_MATERIAL_CATALOG = createMaterialCatalog();
