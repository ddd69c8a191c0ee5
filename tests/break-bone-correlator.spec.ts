import { describe, expect, it } from "vitest";
import { BONE_THRESHOLDS, bonesBreakableAt, computePressure, BreakCalcError } from "../modules/breaking";

describe("bone correlator", () => {
  it("returns nothing below the weakest threshold", () => {
    expect(bonesBreakableAt(0)).toEqual([]);
    expect(bonesBreakableAt(146.9)).toEqual([]);
  });

  it("includes a bone exactly at its threshold", () => {
    expect(bonesBreakableAt(147)).toEqual(["Clavicle"]);
  });

  it("lists bones weakest first", () => {
    expect(bonesBreakableAt(565.7)).toEqual(["Clavicle", "Skull (fracture)", "Ulna", "Skull (crush)"]);
    expect(bonesBreakableAt(10_000)).toEqual([
      "Clavicle",
      "Skull (fracture)",
      "Ulna",
      "Skull (crush)",
      "Ribs",
      "Humerus",
      "Femur",
      "Tibia",
    ]);
  });

  it("keeps the table sorted ascending and frozen", () => {
    const thresholds = BONE_THRESHOLDS.map((entry) => entry.threshold_lbf);
    expect(thresholds).toEqual([...thresholds].sort((a, b) => a - b));
    expect(Object.isFrozen(BONE_THRESHOLDS)).toBe(true);
    expect(Object.isFrozen(BONE_THRESHOLDS[0])).toBe(true);
  });

  it("grows monotonically with force", () => {
    let previous: string[] = [];
    for (let force = 0; force <= 1000; force += 25) {
      const bones = bonesBreakableAt(force);
      expect(bones.slice(0, previous.length)).toEqual(previous);
      previous = bones;
    }
  });
});

describe("pressure converter", () => {
  it("divides force by contact area", () => {
    expect(computePressure(500, 2.5)).toBe(200);
    for (const [force, area] of [
      [565.685, 2.5],
      [1234.5, 0.75],
      [3, 7],
    ]) {
      expect(computePressure(force, area) * area).toBeCloseTo(force, 9);
    }
  });

  it("rejects non-positive contact areas", () => {
    for (const area of [0, -1, Number.NaN]) {
      try {
        computePressure(100, area);
        throw new Error("expected INVALID_CONTACT_AREA");
      } catch (err) {
        if (!(err instanceof BreakCalcError)) throw err;
        expect(err.kind).toBe("INVALID_CONTACT_AREA");
      }
    }
  });
});
