import type {
  TBreakAdvisory,
  TBreakResult,
  TBreakSweepRow,
  TConfiguration,
  TPhysicalConstants,
  TPhysicalConstantsInput,
} from "@shared/breaking";
import { bonesBreakableAt } from "./bone-correlator";
import { MAX_ACCURATE_LAYERS, resolvePhysicalConstants, SPACING_PRESETS_MM } from "./constants";
import { type BreakCalcFailure, isBreakCalcError } from "./errors";
import { estimateForce } from "./force-model";
import { DEFAULT_MATERIAL_CATALOG, type MaterialCatalog } from "./material-catalog";
import { computePressure } from "./pressure";

export type BreakEvaluation =
  | { ok: true; result: TBreakResult; advisories: TBreakAdvisory[] }
  | { ok: false; error: BreakCalcFailure };

export type BreakMatrixEvaluation =
  | { ok: true; results: TBreakResult[]; advisories: TBreakAdvisory[] }
  | { ok: false; error: BreakCalcFailure };

export type BreakSweepOptions = {
  layers?: number[];
  peggedSpacing_mm?: number;
};

export function layerRange(from = 1, to = MAX_ACCURATE_LAYERS): number[] {
  const out: number[] = [];
  for (let n = from; n <= to; n += 1) out.push(n);
  return out;
}

// Domain errors become the failure branch; anything else is a bug and propagates.
function capture<T>(fn: () => T): { ok: true; value: T } | { ok: false; error: BreakCalcFailure } {
  try {
    return { ok: true, value: fn() };
  } catch (err) {
    if (isBreakCalcError(err)) return { ok: false, error: err.toFailure() };
    throw err;
  }
}

function evaluateResolved(
  catalog: MaterialCatalog,
  materialName: string,
  layers: number,
  configuration: TConfiguration,
  constants: TPhysicalConstants,
): { result: TBreakResult; advisories: TBreakAdvisory[] } {
  const material = catalog.resolve(materialName);
  const { force_lbf, advisories } = estimateForce(material, layers, configuration, constants);
  const pressure_psi = computePressure(force_lbf, constants.contactArea_in2);
  return {
    result: { layers, force_lbf, pressure_psi, bones: bonesBreakableAt(force_lbf) },
    advisories,
  };
}

export function evaluate(
  materialName: string,
  layers: number,
  configuration: TConfiguration,
  constants: TPhysicalConstantsInput = {},
  catalog: MaterialCatalog = DEFAULT_MATERIAL_CATALOG,
): BreakEvaluation {
  const outcome = capture(() =>
    evaluateResolved(catalog, materialName, layers, configuration, resolvePhysicalConstants(constants)),
  );
  if (!outcome.ok) return outcome;
  return { ok: true, ...outcome.value };
}

export function evaluateMatrix(
  materialName: string,
  layers: number[],
  configuration: TConfiguration,
  constants: TPhysicalConstantsInput = {},
  catalog: MaterialCatalog = DEFAULT_MATERIAL_CATALOG,
): BreakMatrixEvaluation {
  const outcome = capture(() => {
    const resolved = resolvePhysicalConstants(constants);
    const results: TBreakResult[] = [];
    const advisories: TBreakAdvisory[] = [];
    for (const n of layers) {
      const entry = evaluateResolved(catalog, materialName, n, configuration, resolved);
      results.push(entry.result);
      advisories.push(...entry.advisories);
    }
    return { results, advisories };
  });
  if (!outcome.ok) return outcome;
  return { ok: true, ...outcome.value };
}

/**
 * Every catalog material, pegged (penny spacing by default) then unpegged,
 * across the layer range. Rows come back in that nesting order.
 */
export function evaluateSweep(
  catalog: MaterialCatalog = DEFAULT_MATERIAL_CATALOG,
  constants: TPhysicalConstantsInput = {},
  options: BreakSweepOptions = {},
): { ok: true; rows: TBreakSweepRow[] } | { ok: false; error: BreakCalcFailure } {
  const layers = options.layers ?? layerRange();
  const spacing_mm = options.peggedSpacing_mm ?? SPACING_PRESETS_MM.penny;
  const configurations: TConfiguration[] = [{ kind: "pegged", spacing_mm }, { kind: "unpegged" }];

  const rows: TBreakSweepRow[] = [];
  for (const material of catalog.names()) {
    for (const configuration of configurations) {
      const matrix = evaluateMatrix(material, layers, configuration, constants, catalog);
      if (!matrix.ok) return matrix;
      for (const result of matrix.results) {
        rows.push({
          material,
          config: configuration.kind,
          spacing_mm: configuration.kind === "pegged" ? configuration.spacing_mm : null,
          ...result,
        });
      }
    }
  }
  return { ok: true, rows };
}
