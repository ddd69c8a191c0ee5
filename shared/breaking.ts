import { z } from "zod";

/**
 * Board-break calculator contracts.
 *
 * Units are fixed across the calculator:
 * - force: pounds-force (lbf)
 * - pressure: psi
 * - mass: kg
 * - spacing: mm
 * - contact area: in^2
 * - impact time: s
 */

export const MechanicalClass = z.enum(["flexible", "brittle"]);

export type TMechanicalClass = z.infer<typeof MechanicalClass>;

export const Material = z.object({
  name: z.string().min(1),
  singleLayerForce_lbf: z.number().finite().positive(),
  mass_kg: z.number().finite().positive(),
  mechanicalClass: MechanicalClass,
});

export type TMaterial = z.infer<typeof Material>;

// On-disk / user-supplied shape: { F1, m, type }.
export const MaterialDefinition = z.object({
  F1: z.number().finite().positive(),
  m: z.number().finite().positive(),
  type: MechanicalClass,
});

export type TMaterialDefinition = z.infer<typeof MaterialDefinition>;

export const MaterialOverrides = z.record(z.string(), MaterialDefinition);

export type TMaterialOverrides = z.infer<typeof MaterialOverrides>;

export const Configuration = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("unpegged") }),
  z.object({ kind: z.literal("pegged"), spacing_mm: z.number().nonnegative() }),
]);

export type TConfiguration = z.infer<typeof Configuration>;

export const SpacingPreset = z.enum(["penny", "pencil"]);

export type TSpacingPreset = z.infer<typeof SpacingPreset>;

export const PhysicalConstants = z.object({
  impactTime_s: z.number().positive(),
  contactArea_in2: z.number().positive(),
  scalingExponent: z.number().min(1),
  pegFloorFraction: z.number().positive().max(1),
});

export type TPhysicalConstants = z.infer<typeof PhysicalConstants>;

export type TPhysicalConstantsInput = Partial<TPhysicalConstants>;

export const BoneThreshold = z.object({
  bone: z.string().min(1),
  threshold_lbf: z.number().positive(),
});

export type TBoneThreshold = z.infer<typeof BoneThreshold>;

export const BreakResult = z.object({
  layers: z.number().int().min(1),
  force_lbf: z.number().positive(),
  pressure_psi: z.number().positive(),
  bones: z.array(z.string()),
});

export type TBreakResult = z.infer<typeof BreakResult>;

export const BreakAdvisory = z.object({
  kind: z.literal("LAYERS_BEYOND_MODEL_RANGE"),
  message: z.string(),
  layers: z.number().int(),
  maxAccurateLayers: z.number().int(),
});

export type TBreakAdvisory = z.infer<typeof BreakAdvisory>;

export const BreakSweepRow = BreakResult.extend({
  material: z.string(),
  config: z.enum(["pegged", "unpegged"]),
  spacing_mm: z.number().nonnegative().nullable(),
});

export type TBreakSweepRow = z.infer<typeof BreakSweepRow>;
