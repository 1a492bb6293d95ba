import { DEPOT_PLACEMENTS, FAMILY_IDS, getInstanceFamily } from "@depot-planner/config";
import type { DepotPlacement } from "@depot-planner/config";
import type { Config } from "./config.js";

export const COMMANDS = ["rebalance", "place-depots", "inspect"] as const;

export type Command = (typeof COMMANDS)[number];

export type CliOptions = {
  command: Command;
  inputDir: string;
  outputDir: string;
  factor: number;
  placement: DepotPlacement;
  families: string[];
  /** Single scenario for `inspect` */
  file: string | null;
  /** Treat the input as one flat directory of .txt files instead of family folders */
  directoryMode: boolean;
};

export const USAGE = [
  "usage: depot-planner <command> [flags]",
  "",
  "commands:",
  "  rebalance      split required/non-required edges evenly in every scenario",
  "  place-depots   choose depots covering every node within capacity / factor",
  "  inspect        summarise one scenario and its greedy depot placement",
  "",
  "flags:",
  "  --input=DIR  --output=DIR  --family=ID  --factor=N",
  "  --placement=append|inline  --dir  --file=PATH",
].join("\n");

function readFlag(argv: string[], name: string): string | undefined {
  const arg = argv.find((candidate) => candidate.startsWith(`${name}=`));
  return arg?.slice(name.length + 1);
}

function hasFlag(argv: string[], flag: string): boolean {
  return argv.includes(flag);
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function isPlacement(value: string): value is DepotPlacement {
  return DEPOT_PLACEMENTS.some((placement) => placement === value);
}

function parseFactor(raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const factor = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(factor) || factor <= 0) {
    throw new Error(`--factor must be a positive number, got "${raw}"`);
  }
  return factor;
}

/**
 * Resolve the command and its options. Flags win over environment config.
 */
export function parseCliArgs(argv: string[], config: Config): CliOptions {
  const positional = argv.filter((arg) => !arg.startsWith("--"));
  const commandArg = positional[0];
  if (!commandArg || !isCommand(commandArg)) {
    throw new Error(`Unknown command "${commandArg ?? ""}".\n${USAGE}`);
  }

  const placement = readFlag(argv, "--placement") ?? config.DEPOT_PLACEMENT;
  if (!isPlacement(placement)) {
    throw new Error(`--placement must be one of: ${DEPOT_PLACEMENTS.join(", ")}`);
  }

  const familyArg = readFlag(argv, "--family");
  const families = familyArg ? [getInstanceFamily(familyArg).familyId] : FAMILY_IDS.slice();

  const file = readFlag(argv, "--file") ?? null;
  if (commandArg === "inspect" && !file) {
    throw new Error("inspect needs --file=PATH");
  }

  return {
    command: commandArg,
    inputDir: readFlag(argv, "--input") ?? config.SCENARIO_INPUT_DIR,
    outputDir: readFlag(argv, "--output") ?? config.SCENARIO_OUTPUT_DIR,
    factor: parseFactor(readFlag(argv, "--factor"), config.COVERAGE_FACTOR),
    placement,
    families,
    file,
    directoryMode: hasFlag(argv, "--dir")
  };
}
