// Centralized environment switches for the break calculator
import type { TPhysicalConstantsInput } from "@shared/breaking";

type Env = Record<string, string | undefined>;

const flagEnabled = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return defaultValue;
};

// Unset -> omitted (default applies). Set but unparseable -> NaN, rejected downstream.
const numberOrUndefined = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === "") return undefined;
  return Number(value);
};

export type BreakEnvConfig = {
  constants: TPhysicalConstantsInput;
  materialsPath?: string;
  verbose: boolean;
};

export function readBreakEnv(env: Env = process.env): BreakEnvConfig {
  const constants: TPhysicalConstantsInput = {};
  const impactTime_s = numberOrUndefined(env.BREAK_IMPACT_TIME_S);
  const contactArea_in2 = numberOrUndefined(env.BREAK_CONTACT_AREA_IN2);
  const scalingExponent = numberOrUndefined(env.BREAK_SCALING_EXPONENT);
  const pegFloorFraction = numberOrUndefined(env.BREAK_PEG_FLOOR_FRACTION);
  if (impactTime_s !== undefined) constants.impactTime_s = impactTime_s;
  if (contactArea_in2 !== undefined) constants.contactArea_in2 = contactArea_in2;
  if (scalingExponent !== undefined) constants.scalingExponent = scalingExponent;
  if (pegFloorFraction !== undefined) constants.pegFloorFraction = pegFloorFraction;

  const materialsPath = env.BREAK_MATERIALS_PATH?.trim();
  return {
    constants,
    materialsPath: materialsPath ? materialsPath : undefined,
    verbose: flagEnabled(env.BREAK_VERBOSE, false),
  };
}
