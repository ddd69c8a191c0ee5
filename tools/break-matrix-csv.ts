import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import type { TBreakSweepRow } from "@shared/breaking";

const HEADER = [
  "Material",
  "Config",
  "Spacing_mm",
  "Layers",
  "Force_lbf",
  "PSI",
  "Correlated_Bones",
];

export const NO_BONES_LABEL = "None";

const round1 = (n: number): string => (Math.round(n * 10) / 10).toString();

// User-defined material names may carry commas, quotes or line breaks.
const quote = (value: string): string =>
  /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

export function toBreakCsv(rows: TBreakSweepRow[]): string {
  const lines = rows.map((row) => {
    const cells = [
      quote(row.material),
      row.config,
      row.spacing_mm === null ? "N/A" : row.spacing_mm,
      row.layers,
      round1(row.force_lbf),
      round1(row.pressure_psi),
      row.bones.length ? row.bones.join("|") : NO_BONES_LABEL,
    ];
    return cells.join(",");
  });
  return [HEADER.join(","), ...lines].join("\n");
}

export async function writeBreakCsv(filePath: string, rows: TBreakSweepRow[]): Promise<string> {
  const outPath = resolve(process.cwd(), filePath);
  await mkdir(dirname(outPath), { recursive: true });
  await writeFile(outPath, `${toBreakCsv(rows)}\n`, "utf8");
  return outPath;
}
