#!/usr/bin/env -S tsx

import { createInterface } from "node:readline/promises";
import type { TConfiguration, TPhysicalConstantsInput } from "@shared/breaking";
import {
  evaluate,
  evaluateMatrix,
  evaluateSweep,
  isBreakCalcError,
  layerRange,
  type MaterialCatalog,
} from "../modules/breaking";
import { readBreakEnv } from "../tools/break-env";
import { writeBreakCsv } from "../tools/break-matrix-csv";
import { loadCatalogFromFile } from "../tools/material-overrides";
import {
  BREAK_CLI_USAGE,
  parseBreakArgs,
  resolveCliConfiguration,
  resolveCliSpacing,
} from "./break-args";
import {
  formatAdvisory,
  formatFailure,
  formatMatrixLines,
  formatResultLines,
} from "./break-format";
import { promptSelection } from "./break-interactive";

type RunOptions = {
  catalog: MaterialCatalog;
  constants: TPhysicalConstantsInput;
  json: boolean;
  peggedSpacing_mm?: number;
};

async function runCsv(
  file: string,
  { catalog, constants, peggedSpacing_mm }: RunOptions,
): Promise<boolean> {
  const sweep = evaluateSweep(catalog, constants, { peggedSpacing_mm });
  if (!sweep.ok) {
    console.error(formatFailure(sweep.error));
    return false;
  }
  const outPath = await writeBreakCsv(file, sweep.rows);
  console.error(`[break-calc] wrote ${sweep.rows.length} rows to ${outPath}`);
  return true;
}

function runSingle(
  material: string,
  layers: number,
  configuration: TConfiguration,
  { catalog, constants, json }: RunOptions,
): boolean {
  const outcome = evaluate(material, layers, configuration, constants, catalog);
  if (!outcome.ok) {
    console.error(formatFailure(outcome.error));
    return false;
  }
  outcome.advisories.forEach((advisory) => console.warn(formatAdvisory(advisory)));
  if (json) {
    console.log(JSON.stringify({ material, configuration, ...outcome }, null, 2));
  } else {
    formatResultLines(outcome.result).forEach((line) => console.log(line));
  }
  return true;
}

function runMatrix(
  material: string,
  configuration: TConfiguration,
  { catalog, constants, json }: RunOptions,
): boolean {
  const outcome = evaluateMatrix(material, layerRange(), configuration, constants, catalog);
  if (!outcome.ok) {
    console.error(formatFailure(outcome.error));
    return false;
  }
  if (json) {
    console.log(JSON.stringify({ material, configuration, ...outcome }, null, 2));
  } else {
    formatMatrixLines(material, configuration, outcome.results).forEach((line) => console.log(line));
  }
  return true;
}

async function runInteractive(options: RunOptions): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const selection = await promptSelection(
    (question) => rl.question(question),
    (line) => console.log(line),
    options.catalog.names(),
  ).finally(() => rl.close());

  switch (selection.mode) {
    case "csv":
      return runCsv(selection.file, options);
    case "matrix":
      return runMatrix(selection.material, selection.configuration, options);
    case "single":
      return runSingle(selection.material, selection.layers, selection.configuration, options);
  }
}

async function main(): Promise<boolean> {
  const argv = process.argv.slice(2);
  const env = readBreakEnv();
  if (env.verbose) {
    console.error("[break-calc] env constants:", JSON.stringify(env.constants));
  }

  if (argv.length === 0) {
    const catalog = await loadCatalogFromFile(env.materialsPath);
    return runInteractive({ catalog, constants: env.constants, json: false });
  }

  const args = parseBreakArgs(argv);
  if (args.help) {
    console.log(BREAK_CLI_USAGE);
    return true;
  }
  if (args.errors.length) {
    args.errors.forEach((error) => console.error(`[break-calc] ${error}`));
    console.error(BREAK_CLI_USAGE);
    return false;
  }

  const catalog = await loadCatalogFromFile(args.materialsPath ?? env.materialsPath);
  const options: RunOptions = {
    catalog,
    constants: { ...env.constants, ...args.constants },
    json: args.json,
  };
  if (env.verbose) {
    console.error(`[break-calc] materials: ${catalog.names().join(", ")}`);
  }

  if (args.allCsv) {
    return runCsv(args.allCsv, { ...options, peggedSpacing_mm: resolveCliSpacing(args) });
  }
  if (!args.material) {
    console.error("[break-calc] --material is required (except with --all-csv)");
    console.error(BREAK_CLI_USAGE);
    return false;
  }

  const configuration = resolveCliConfiguration(args);
  return args.matrix
    ? runMatrix(args.material, configuration, options)
    : runSingle(args.material, args.layers, configuration, options);
}

main()
  .then((ok) => {
    if (!ok) process.exitCode = 1;
  })
  .catch((err) => {
    console.error(isBreakCalcError(err) ? formatFailure(err.toFailure()) : err);
    process.exit(1);
  });
