import fs from "node:fs/promises";
import path from "node:path";
import {
  BreakCalcError,
  createMaterialCatalog,
  loadOverrides,
  type MaterialCatalog,
} from "../modules/breaking";
import type { TMaterial } from "@shared/breaking";

export async function readMaterialOverrides(filePath: string): Promise<Record<string, TMaterial>> {
  const resolved = path.resolve(filePath);
  const src = await fs.readFile(resolved, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(src);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new BreakCalcError(
      "INVALID_MATERIAL_DEFINITION",
      `failed to parse material file ${resolved}: ${message}`,
    );
  }
  return loadOverrides(raw);
}

export async function loadCatalogFromFile(filePath?: string): Promise<MaterialCatalog> {
  if (!filePath) return createMaterialCatalog();
  const overrides = await readMaterialOverrides(filePath);
  return createMaterialCatalog(overrides);
}
