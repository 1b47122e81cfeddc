import { type SimulationConfig, resolveConfig } from "../core/config";
import type { AlgorithmResult } from "../core/metrics";
import { CapacityExceeded } from "../core/errors";
import type { ProcessTable } from "../core/table";
import { ALGORITHMS, type AlgorithmName } from "./policy";

export type SimulationReport = {
  config: SimulationConfig;
  runs: Record<AlgorithmName, AlgorithmResult>;
  meanTurnaround: Record<AlgorithmName, number>;
};

function configFor(
  table: ProcessTable,
  overrides: Partial<SimulationConfig>
): SimulationConfig {
  const config = resolveConfig(overrides);

  if (table.processes.length > config.maxProcesses) {
    throw new CapacityExceeded(table.processes.length, config.maxProcesses);
  }
  return config;
}

export function runAlgorithm(
  name: AlgorithmName,
  table: ProcessTable,
  overrides: Partial<SimulationConfig> = {}
): AlgorithmResult {
  return ALGORITHMS[name].run(table, configFor(table, overrides));
}

export function simulate(
  table: ProcessTable,
  overrides: Partial<SimulationConfig> = {}
): SimulationReport {
  const config = configFor(table, overrides);
  const run = (name: AlgorithmName) => ALGORITHMS[name].run(table, config);

  const runs: Record<AlgorithmName, AlgorithmResult> = {
    FCFS: run("FCFS"),
    LCFS_NP: run("LCFS_NP"),
    LCFS_P: run("LCFS_P"),
    RR: run("RR"),
    SJF: run("SJF"),
  };

  return {
    config,
    runs,
    meanTurnaround: {
      FCFS: runs.FCFS.meanTurnaround,
      LCFS_NP: runs.LCFS_NP.meanTurnaround,
      LCFS_P: runs.LCFS_P.meanTurnaround,
      RR: runs.RR.meanTurnaround,
      SJF: runs.SJF.meanTurnaround,
    },
  };
}
