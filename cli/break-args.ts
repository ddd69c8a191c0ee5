import type { TConfiguration, TPhysicalConstantsInput } from "@shared/breaking";
import { resolveSpacing } from "../modules/breaking";

export type BreakCliArgs = {
  material?: string;
  layers: number;
  config: TConfiguration["kind"];
  spacing_mm?: number;
  pencil: boolean;
  matrix: boolean;
  allCsv?: string;
  materialsPath?: string;
  constants: TPhysicalConstantsInput;
  json: boolean;
  help: boolean;
  errors: string[];
};

const VALUE_FLAGS = new Set([
  "--material",
  "--layers",
  "--config",
  "--spacing",
  "--all-csv",
  "--materials",
  "--impact-time",
  "--contact-area",
  "--exponent",
  "--peg-floor",
]);

export function parseBreakArgs(argv: string[]): BreakCliArgs {
  const parsed: BreakCliArgs = {
    layers: 1,
    config: "unpegged",
    pencil: false,
    matrix: false,
    constants: {},
    json: false,
    help: false,
    errors: [],
  };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    const eq = token.indexOf("=");
    const flag = token.startsWith("--") && eq > 0 ? token.slice(0, eq) : token;

    if (flag === "--pencil") {
      parsed.pencil = true;
      continue;
    }
    if (flag === "--matrix") {
      parsed.matrix = true;
      continue;
    }
    if (flag === "--json") {
      parsed.json = true;
      continue;
    }
    if (flag === "--help" || flag === "-h") {
      parsed.help = true;
      continue;
    }
    if (!VALUE_FLAGS.has(flag)) {
      parsed.errors.push(`unknown argument "${token}"`);
      continue;
    }

    let value: string | undefined;
    if (eq > 0 && flag !== token) {
      value = token.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i += 1;
    }
    if (value === undefined) {
      parsed.errors.push(`${flag} expects a value`);
      continue;
    }

    switch (flag) {
      case "--material":
        parsed.material = value;
        break;
      case "--layers":
        parsed.layers = Number(value);
        break;
      case "--config":
        if (value === "pegged" || value === "unpegged") {
          parsed.config = value;
        } else {
          parsed.errors.push(`--config must be "pegged" or "unpegged" (got "${value}")`);
        }
        break;
      case "--spacing":
        parsed.spacing_mm = Number(value);
        break;
      case "--all-csv":
        parsed.allCsv = value;
        break;
      case "--materials":
        parsed.materialsPath = value;
        break;
      case "--impact-time":
        parsed.constants.impactTime_s = Number(value);
        break;
      case "--contact-area":
        parsed.constants.contactArea_in2 = Number(value);
        break;
      case "--exponent":
        parsed.constants.scalingExponent = Number(value);
        break;
      case "--peg-floor":
        parsed.constants.pegFloorFraction = Number(value);
        break;
    }
  }

  return parsed;
}

/** Explicit --spacing wins, then --pencil, then the penny default. */
export function resolveCliSpacing(args: BreakCliArgs): number {
  if (args.spacing_mm !== undefined) return resolveSpacing(args.spacing_mm);
  return resolveSpacing(args.pencil ? "pencil" : "penny");
}

export function resolveCliConfiguration(args: BreakCliArgs): TConfiguration {
  if (args.config === "unpegged") return { kind: "unpegged" };
  return { kind: "pegged", spacing_mm: resolveCliSpacing(args) };
}

export const BREAK_CLI_USAGE = `Martial arts breaking calculator

Usage:
  tsx cli/break-calc.ts                       interactive mode
  tsx cli/break-calc.ts --material pine --layers 3 [options]
  tsx cli/break-calc.ts --all-csv breaking_matrix.csv

Options:
  --material <name>       Material from the catalog (pine, paulownia, concrete, or an override)
  --layers <n>            Number of layers (default: 1; above 10 the model is extrapolating)
  --config <kind>         pegged | unpegged (default: unpegged)
  --spacing <mm>          Spacer thickness for pegged stacks and the CSV sweep (default: penny, 1.52 mm)
  --pencil                Use carpenter pencil spacing (6.35 mm) for pegged stacks and the CSV sweep
  --matrix                Print layers 1-10 instead of a single calculation
  --all-csv <file>        Write the pegged/unpegged sweep for every material to a CSV file
  --materials <json>      Material override file: { "name": { "F1": lbf, "m": kg, "type": "flexible" | "brittle" } }
  --impact-time <s>       Impact duration (default: 0.005)
  --contact-area <in2>    Striking contact area (default: 2.5)
  --exponent <k>          Flexible stack scaling exponent (default: 1.5)
  --peg-floor <f>         Minimum pegged force as a fraction of F1 * n (default: 0.5)
  --json                  Emit JSON instead of text
  --help                  Show this message
`;
