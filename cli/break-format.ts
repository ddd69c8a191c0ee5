import type { TBreakAdvisory, TBreakResult, TConfiguration } from "@shared/breaking";
import type { BreakCalcFailure } from "../modules/breaking";

export const NO_BONES_TEXT = "None (below typical bone breaking thresholds)";
export const BONE_DISCLAIMER = "(Note: Bone data approximations for healthy adults; not medical advice.)";

export const formatBones = (bones: string[]): string =>
  bones.length ? bones.join(", ") : NO_BONES_TEXT;

export function formatResultLines(result: TBreakResult): string[] {
  return [
    `Layers: ${result.layers}, Force: ${result.force_lbf.toFixed(1)} lbf, PSI: ${result.pressure_psi.toFixed(1)}`,
    `Correlated Bones (could potentially break): ${formatBones(result.bones)}`,
    BONE_DISCLAIMER,
  ];
}

export function describeConfiguration(configuration: TConfiguration): string {
  return configuration.kind === "pegged"
    ? `pegged (spacing ${configuration.spacing_mm} mm)`
    : "unpegged";
}

export function formatMatrixLines(
  material: string,
  configuration: TConfiguration,
  results: TBreakResult[],
): string[] {
  return [
    `Matrix for ${material}, ${describeConfiguration(configuration)}:`,
    "| Layers | Force (lbf) | PSI | Correlated Bones |",
    "|---|---|---|---|",
    ...results.map(
      (r) =>
        `| ${r.layers} | ${r.force_lbf.toFixed(1)} | ${r.pressure_psi.toFixed(1)} | ${formatBones(r.bones)} |`,
    ),
  ];
}

export const formatAdvisory = (advisory: TBreakAdvisory): string =>
  `[break-calc] warning: ${advisory.message}`;

export const formatFailure = (failure: BreakCalcFailure): string =>
  `[break-calc] ${failure.kind}: ${failure.message}`;
