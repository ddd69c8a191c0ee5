/**
 * Breaking-force model for stacked demonstration materials.
 *
 * Unpegged stacks scale superlinearly for flexible boards (they reinforce each
 * other) and linearly for brittle slabs (each layer fails on its own). Pegged
 * stacks start from the additive base F1 * n and subtract the momentum a
 * falling fragment picks up across each spacer gap, clamped to a floor.
 */

import type {
  TBreakAdvisory,
  TConfiguration,
  TMaterial,
  TMechanicalClass,
  TPhysicalConstants,
} from "@shared/breaking";
import { G_STANDARD, MM_TO_M, N_PER_LBF } from "@shared/physics-const";
import { MAX_ACCURATE_LAYERS } from "./constants";
import { BreakCalcError } from "./errors";

export type ForceEstimate = {
  force_lbf: number;
  advisories: TBreakAdvisory[];
};

// Wood fragments carry less of their momentum into the next board than concrete.
const FRAGMENT_ASSIST_FACTOR: Record<TMechanicalClass, number> = {
  flexible: 0.5,
  brittle: 1.0,
};

export function assertLayerCount(layers: number): void {
  if (!Number.isSafeInteger(layers) || layers < 1) {
    throw new BreakCalcError(
      "INVALID_LAYER_COUNT",
      `layer count must be an integer between 1 and ${Number.MAX_SAFE_INTEGER} (got ${layers})`,
    );
  }
}

export function layerAdvisories(layers: number): TBreakAdvisory[] {
  if (layers <= MAX_ACCURATE_LAYERS) return [];
  return [
    {
      kind: "LAYERS_BEYOND_MODEL_RANGE",
      message: `${layers} layers exceeds the ${MAX_ACCURATE_LAYERS}-layer range the model is tuned for; treat the result as a rough extrapolation`,
      layers,
      maxAccurateLayers: MAX_ACCURATE_LAYERS,
    },
  ];
}

/** Assist force (lbf) one fragment contributes after free-falling `spacing_mm`. */
export function fragmentAssistForce(
  mass_kg: number,
  spacing_mm: number,
  impactTime_s: number,
): number {
  const v = Math.sqrt(2 * G_STANDARD * spacing_mm * MM_TO_M);
  const force_N = (mass_kg * v) / impactTime_s;
  return force_N / N_PER_LBF;
}

function peggedForce(
  material: TMaterial,
  layers: number,
  spacing_mm: number,
  constants: TPhysicalConstants,
): number {
  if (!Number.isFinite(spacing_mm) || spacing_mm < 0) {
    throw new BreakCalcError("INVALID_SPACING", `spacing must be >= 0 mm (got ${spacing_mm})`);
  }
  const F1 = material.singleLayerForce_lbf;
  const base = F1 * layers;
  const gaps = layers - 1;
  if (gaps === 0 || spacing_mm === 0) return base;

  const assist = fragmentAssistForce(material.mass_kg, spacing_mm, constants.impactTime_s);
  const reduction = gaps * assist * FRAGMENT_ASSIST_FACTOR[material.mechanicalClass];
  const floor = Math.max(F1, constants.pegFloorFraction * base);
  return Math.max(base - reduction, floor);
}

function stackForce(
  material: TMaterial,
  layers: number,
  configuration: TConfiguration,
  constants: TPhysicalConstants,
): number {
  const F1 = material.singleLayerForce_lbf;
  switch (configuration.kind) {
    case "unpegged":
      return material.mechanicalClass === "flexible"
        ? F1 * layers ** constants.scalingExponent
        : F1 * layers;
    case "pegged":
      return peggedForce(material, layers, configuration.spacing_mm, constants);
  }
}

export function estimateForce(
  material: TMaterial,
  layers: number,
  configuration: TConfiguration,
  constants: TPhysicalConstants,
): ForceEstimate {
  assertLayerCount(layers);
  const force_lbf = stackForce(material, layers, configuration, constants);
  if (!Number.isFinite(force_lbf)) {
    throw new BreakCalcError(
      "INVALID_CONSTANT",
      `force for ${layers} layers of ${material.name} overflows with scaling exponent ${constants.scalingExponent}`,
    );
  }
  return { force_lbf, advisories: layerAdvisories(layers) };
}

export function computeForce(
  material: TMaterial,
  layers: number,
  configuration: TConfiguration,
  constants: TPhysicalConstants,
): number {
  return estimateForce(material, layers, configuration, constants).force_lbf;
}
