import { InvalidConfiguration } from "./errors";

export interface SimulationConfig {
  /** Round Robin time slice. */
  quantum: number;
  /** Largest process table accepted by `createProcessTable`. */
  maxProcesses: number;
}

export const DEFAULT_CONFIG: Readonly<SimulationConfig> = Object.freeze({
  quantum: 2,
  maxProcesses: 100,
});

function assertPositiveInteger(name: keyof SimulationConfig, value: number) {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidConfiguration(
      `${name} must be a positive integer (got ${value})`
    );
  }
}

export function resolveConfig(
  overrides: Partial<SimulationConfig> = {}
): SimulationConfig {
  const config: SimulationConfig = {
    ...DEFAULT_CONFIG,
    ...overrides,
  };

  assertPositiveInteger("quantum", config.quantum);
  assertPositiveInteger("maxProcesses", config.maxProcesses);

  return config;
}
