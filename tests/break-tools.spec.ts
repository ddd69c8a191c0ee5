import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { TBreakSweepRow } from "@shared/breaking";
import { BreakCalcError, evaluateSweep } from "../modules/breaking";
import { readBreakEnv } from "../tools/break-env";
import { toBreakCsv, writeBreakCsv } from "../tools/break-matrix-csv";
import { loadCatalogFromFile, readMaterialOverrides } from "../tools/material-overrides";

describe("break env config", () => {
  it("omits unset constants", () => {
    expect(readBreakEnv({})).toEqual({ constants: {}, materialsPath: undefined, verbose: false });
  });

  it("reads constants, materials path and verbosity", () => {
    const config = readBreakEnv({
      BREAK_IMPACT_TIME_S: "0.004",
      BREAK_CONTACT_AREA_IN2: "3",
      BREAK_SCALING_EXPONENT: "2",
      BREAK_PEG_FLOOR_FRACTION: "0.25",
      BREAK_MATERIALS_PATH: " configs/materials.json ",
      BREAK_VERBOSE: "yes",
    });
    expect(config).toEqual({
      constants: {
        impactTime_s: 0.004,
        contactArea_in2: 3,
        scalingExponent: 2,
        pegFloorFraction: 0.25,
      },
      materialsPath: "configs/materials.json",
      verbose: true,
    });
  });

  it("passes unparseable values through as NaN", () => {
    const config = readBreakEnv({ BREAK_CONTACT_AREA_IN2: "wide" });
    expect(Number.isNaN(config.constants.contactArea_in2)).toBe(true);
  });
});

describe("break matrix csv", () => {
  const rows: TBreakSweepRow[] = [
    {
      material: "pine",
      config: "pegged",
      spacing_mm: 1.52,
      layers: 2,
      force_lbf: 396.8947,
      pressure_psi: 158.7579,
      bones: ["Clavicle", "Skull (fracture)", "Ulna"],
    },
    {
      material: "paulownia",
      config: "unpegged",
      spacing_mm: null,
      layers: 1,
      force_lbf: 100,
      pressure_psi: 40,
      bones: [],
    },
    {
      material: 'board, "thin"',
      config: "unpegged",
      spacing_mm: null,
      layers: 1,
      force_lbf: 50,
      pressure_psi: 20,
      bones: [],
    },
  ];

  it("renders header, rounding, spacing and bone columns", () => {
    expect(toBreakCsv(rows).split("\n")).toEqual([
      "Material,Config,Spacing_mm,Layers,Force_lbf,PSI,Correlated_Bones",
      "pine,pegged,1.52,2,396.9,158.8,Clavicle|Skull (fracture)|Ulna",
      "paulownia,unpegged,N/A,1,100,40,None",
      '"board, ""thin""",unpegged,N/A,1,50,20,None',
    ]);
  });

  it("quotes names carrying a carriage return", () => {
    const row: TBreakSweepRow = {
      material: "split\rboard",
      config: "unpegged",
      spacing_mm: null,
      layers: 1,
      force_lbf: 50,
      pressure_psi: 20,
      bones: [],
    };
    expect(toBreakCsv([row]).split("\n")[1]).toBe('"split\rboard",unpegged,N/A,1,50,20,None');
  });

  describe("on disk", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), "break-calc-"));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it("writes the full sweep into a nested directory", async () => {
      const sweep = evaluateSweep();
      if (!sweep.ok) throw new Error(sweep.error.message);

      const outPath = await writeBreakCsv(path.join(dir, "out", "matrix.csv"), sweep.rows);
      const lines = (await fs.readFile(outPath, "utf8")).trimEnd().split("\n");
      expect(lines).toHaveLength(61);
      expect(lines[1]).toBe("pine,pegged,1.52,1,200,80,Clavicle|Skull (fracture)");
      expect(lines[60]).toBe(
        "concrete,unpegged,N/A,10,5000,2000,Clavicle|Skull (fracture)|Ulna|Skull (crush)|Ribs|Humerus|Femur|Tibia",
      );
    });

    it("loads material overrides from a JSON file", async () => {
      const file = path.join(dir, "materials.json");
      await fs.writeFile(file, JSON.stringify({ oak: { F1: 320, m: 1.1, type: "flexible" } }));

      const overrides = await readMaterialOverrides(file);
      expect(overrides.oak.singleLayerForce_lbf).toBe(320);

      const catalog = await loadCatalogFromFile(file);
      expect(catalog.names()).toEqual(["pine", "paulownia", "concrete", "oak"]);
    });

    it("reports malformed JSON as an invalid material definition", async () => {
      const file = path.join(dir, "broken.json");
      await fs.writeFile(file, "{ oak: ");
      await expect(readMaterialOverrides(file)).rejects.toBeInstanceOf(BreakCalcError);
      await expect(readMaterialOverrides(file)).rejects.toMatchObject({
        kind: "INVALID_MATERIAL_DEFINITION",
      });
    });

    it("falls back to the default catalog without a path", async () => {
      const catalog = await loadCatalogFromFile();
      expect(catalog.names()).toEqual(["pine", "paulownia", "concrete"]);
    });
  });
});
