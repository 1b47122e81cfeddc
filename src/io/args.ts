import type { SimulationConfig } from "../core/config";

export const USAGE =
  "Usage: turnaround-sim <input-file> [--quantum N] [--max-processes N] [--json] [--verbose]";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliArgs {
  input: string;
  overrides: Partial<SimulationConfig>;
  json: boolean;
  verbose: boolean;
}

const VALUED_FLAGS = ["--quantum", "--max-processes"];
const SWITCHES = ["--json", "--verbose"];

function readInteger(argv: string[], flag: string): number | undefined {
  const index = argv.indexOf(flag);
  if (index === -1) return undefined;

  const raw = argv[index + 1];
  if (raw === undefined || !/^\d+$/.test(raw)) {
    throw new UsageError(`${flag} expects a positive integer`);
  }
  return Number.parseInt(raw, 10);
}

export function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (VALUED_FLAGS.includes(arg)) {
      i++;
    } else if (arg.startsWith("--") && !SWITCHES.includes(arg)) {
      throw new UsageError(`Unknown option ${arg}`);
    } else if (!arg.startsWith("--")) {
      positional.push(arg);
    }
  }

  if (positional.length !== 1) {
    throw new UsageError("Expected exactly one input file");
  }

  const overrides: Partial<SimulationConfig> = {};
  const quantum = readInteger(argv, "--quantum");
  const maxProcesses = readInteger(argv, "--max-processes");
  if (quantum !== undefined) overrides.quantum = quantum;
  if (maxProcesses !== undefined) overrides.maxProcesses = maxProcesses;

  return {
    input: positional[0],
    overrides,
    json: argv.includes("--json"),
    verbose: argv.includes("--verbose"),
  };
}
