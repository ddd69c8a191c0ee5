export { BONE_THRESHOLDS, bonesBreakableAt } from "./bone-correlator";
export {
  DEFAULT_PHYSICAL_CONSTANTS,
  MAX_ACCURATE_LAYERS,
  SPACING_PRESETS_MM,
  resolvePhysicalConstants,
  resolveSpacing,
} from "./constants";
export { BreakCalcError, isBreakCalcError } from "./errors";
export type { BreakCalcErrorKind, BreakCalcFailure } from "./errors";
export {
  evaluate,
  evaluateMatrix,
  evaluateSweep,
  layerRange,
} from "./evaluate";
export type { BreakEvaluation, BreakMatrixEvaluation, BreakSweepOptions } from "./evaluate";
export { computeForce, estimateForce, fragmentAssistForce } from "./force-model";
export type { ForceEstimate } from "./force-model";
export {
  DEFAULT_MATERIAL_CATALOG,
  DEFAULT_MATERIAL_DEFINITIONS,
  createMaterialCatalog,
  loadOverrides,
  normalizeMaterialName,
} from "./material-catalog";
export type { MaterialCatalog } from "./material-catalog";
export { computePressure } from "./pressure";
