/**
 * Physics constants (shared).
 *
 * Goal: keep the force model, CLI and tooling numerically consistent.
 * Imperial units are used wherever the calculator reports to the user.
 */

// Standard gravity (m/s^2).
export const G_STANDARD = 9.806_65;

// Newtons per pound-force.
export const N_PER_LBF = 4.448_221_615_260_5;

export const MM_TO_M = 1e-3;
