import type {
  TPhysicalConstants,
  TPhysicalConstantsInput,
  TSpacingPreset,
} from "@shared/breaking";
import { BreakCalcError } from "./errors";

export const DEFAULT_PHYSICAL_CONSTANTS: Readonly<TPhysicalConstants> = Object.freeze({
  impactTime_s: 0.005,
  contactArea_in2: 2.5,
  scalingExponent: 1.5,
  pegFloorFraction: 0.5,
});

// US penny and carpenter pencil thickness.
export const SPACING_PRESETS_MM: Readonly<Record<TSpacingPreset, number>> = Object.freeze({
  penny: 1.52,
  pencil: 6.35,
});

// Beyond this the stack model is only a rough extrapolation.
export const MAX_ACCURATE_LAYERS = 10;

const pick = (value: number | undefined, fallback: number): number =>
  value === undefined ? fallback : value;

/**
 * Fill omitted constants from the defaults. A supplied value is validated and
 * never swapped for a default.
 */
export function resolvePhysicalConstants(
  input: TPhysicalConstantsInput = {},
): TPhysicalConstants {
  const resolved: TPhysicalConstants = {
    impactTime_s: pick(input.impactTime_s, DEFAULT_PHYSICAL_CONSTANTS.impactTime_s),
    contactArea_in2: pick(input.contactArea_in2, DEFAULT_PHYSICAL_CONSTANTS.contactArea_in2),
    scalingExponent: pick(input.scalingExponent, DEFAULT_PHYSICAL_CONSTANTS.scalingExponent),
    pegFloorFraction: pick(input.pegFloorFraction, DEFAULT_PHYSICAL_CONSTANTS.pegFloorFraction),
  };

  if (!Number.isFinite(resolved.impactTime_s) || resolved.impactTime_s <= 0) {
    throw new BreakCalcError(
      "INVALID_CONSTANT",
      `impact time must be a positive number of seconds (got ${resolved.impactTime_s})`,
    );
  }
  if (!Number.isFinite(resolved.contactArea_in2) || resolved.contactArea_in2 <= 0) {
    throw new BreakCalcError(
      "INVALID_CONTACT_AREA",
      `contact area must be a positive number of square inches (got ${resolved.contactArea_in2})`,
    );
  }
  if (!Number.isFinite(resolved.scalingExponent) || resolved.scalingExponent < 1) {
    throw new BreakCalcError(
      "INVALID_CONSTANT",
      `scaling exponent must be >= 1 (got ${resolved.scalingExponent})`,
    );
  }
  if (
    !Number.isFinite(resolved.pegFloorFraction) ||
    resolved.pegFloorFraction <= 0 ||
    resolved.pegFloorFraction > 1
  ) {
    throw new BreakCalcError(
      "INVALID_CONSTANT",
      `peg floor fraction must be in (0, 1] (got ${resolved.pegFloorFraction})`,
    );
  }

  return resolved;
}

export function resolveSpacing(spacing: TSpacingPreset | number): number {
  const value = typeof spacing === "number" ? spacing : SPACING_PRESETS_MM[spacing];
  if (!Number.isFinite(value) || value < 0) {
    throw new BreakCalcError("INVALID_SPACING", `spacing must be >= 0 mm (got ${value})`);
  }
  return value;
}
