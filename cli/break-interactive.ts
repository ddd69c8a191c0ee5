import type { TConfiguration } from "@shared/breaking";
import { SPACING_PRESETS_MM } from "../modules/breaking";

export type Ask = (question: string) => Promise<string>;
export type Print = (line: string) => void;

export type InteractiveSelection =
  | { mode: "csv"; file: string }
  | { mode: "single"; material: string; configuration: TConfiguration; layers: number }
  | { mode: "matrix"; material: string; configuration: TConfiguration };

export const DEFAULT_CSV_FILE = "breaking_matrix.csv";

async function choose(
  ask: Ask,
  print: Print,
  question: string,
  valid: string[],
  fallback?: string,
): Promise<string> {
  for (;;) {
    const answer = (await ask(question)).trim() || fallback || "";
    if (valid.includes(answer)) return answer;
    print(`Invalid choice. Please enter ${valid[0]}-${valid[valid.length - 1]}.`);
  }
}

async function askNumber(
  ask: Ask,
  print: Print,
  question: string,
  accept: (n: number) => boolean,
  hint: string,
  fallback?: string,
): Promise<number> {
  for (;;) {
    const raw = (await ask(question)).trim() || fallback || "";
    const n = raw === "" ? Number.NaN : Number(raw);
    if (Number.isFinite(n) && accept(n)) return n;
    print(hint);
  }
}

async function chooseSpacing(ask: Ask, print: Print): Promise<number> {
  print("");
  print("Select spacing:");
  print(`1. penny (${SPACING_PRESETS_MM.penny} mm, default)`);
  print(`2. pencil (${SPACING_PRESETS_MM.pencil} mm)`);
  print("3. custom");
  const choice = await choose(ask, print, "Enter number (1-3) [default 1]: ", ["1", "2", "3"], "1");
  if (choice === "1") return SPACING_PRESETS_MM.penny;
  if (choice === "2") return SPACING_PRESETS_MM.pencil;
  return askNumber(
    ask,
    print,
    "Enter custom spacing in mm: ",
    (n) => n >= 0,
    "Invalid number. Please enter a spacing of 0 mm or more.",
  );
}

/** Walks the prompt sequence and returns what the user picked. */
export async function promptSelection(
  ask: Ask,
  print: Print,
  materials: string[],
): Promise<InteractiveSelection> {
  print("Martial Arts Breaking Calculator");
  print("This tool calculates force and PSI for breaking materials.");
  print("Select mode:");
  print("1. single calculation (default)");
  print("2. matrix (1-10 layers)");
  print("3. CSV matrix for all materials");
  const mode = await choose(ask, print, "Enter number (1-3) [default 1]: ", ["1", "2", "3"], "1");

  if (mode === "3") {
    const file = (await ask(`Enter CSV filename [default: ${DEFAULT_CSV_FILE}]: `)).trim();
    return { mode: "csv", file: file || DEFAULT_CSV_FILE };
  }

  print("");
  print("Select material by number:");
  materials.forEach((name, idx) => print(`${idx + 1}. ${name}`));
  const materialChoices = materials.map((_, idx) => String(idx + 1));
  const materialChoice = await choose(
    ask,
    print,
    `Enter number (1-${materials.length}): `,
    materialChoices,
  );
  const material = materials[Number(materialChoice) - 1];

  print("");
  print("Select configuration:");
  print("1. pegged");
  print("2. unpegged (default)");
  const configChoice = await choose(ask, print, "Enter number (1-2) [default 2]: ", ["1", "2"], "2");
  const configuration: TConfiguration =
    configChoice === "1"
      ? { kind: "pegged", spacing_mm: await chooseSpacing(ask, print) }
      : { kind: "unpegged" };

  if (mode === "2") {
    return { mode: "matrix", material, configuration };
  }

  const layers = await askNumber(
    ask,
    print,
    "\nEnter number of layers [default: 1]: ",
    (n) => Number.isInteger(n) && n >= 1,
    "Layers must be a whole number of 1 or more.",
    "1",
  );
  return { mode: "single", material, configuration, layers };
}
