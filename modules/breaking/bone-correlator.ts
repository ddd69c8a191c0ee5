import type { TBoneThreshold } from "@shared/breaking";

/**
 * Average breaking forces for healthy adult bones (lbf). Approximations for
 * educational comparison only; they vary with age, density and loading.
 */
const BONE_DATA: TBoneThreshold[] = [
  { bone: "Clavicle", threshold_lbf: 147 },
  { bone: "Skull (fracture)", threshold_lbf: 196 },
  { bone: "Ulna", threshold_lbf: 337 },
  { bone: "Skull (crush)", threshold_lbf: 517 },
  { bone: "Ribs", threshold_lbf: 742 },
  { bone: "Humerus", threshold_lbf: 787 },
  { bone: "Femur", threshold_lbf: 899 },
  { bone: "Tibia", threshold_lbf: 900 },
];

export const BONE_THRESHOLDS: ReadonlyArray<Readonly<TBoneThreshold>> = Object.freeze(
  [...BONE_DATA]
    .sort((a, b) => a.threshold_lbf - b.threshold_lbf)
    .map((entry) => Object.freeze({ ...entry })),
);

/** Bones whose threshold is at or below `force_lbf`, weakest first. */
export function bonesBreakableAt(force_lbf: number): string[] {
  const bones: string[] = [];
  for (const entry of BONE_THRESHOLDS) {
    if (entry.threshold_lbf > force_lbf) break;
    bones.push(entry.bone);
  }
  return bones;
}
