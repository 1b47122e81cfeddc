import type { SimulationConfig } from "../core/config";
import type { AlgorithmResult } from "../core/metrics";
import type { ProcessTable } from "../core/table";
import { fcfs } from "./algorithms/fcfs";
import { lcfsNonPreemptive, lcfsPreemptive } from "./algorithms/lcfs";
import { roundRobin } from "./algorithms/roundRobin";
import { sjf } from "./algorithms/sjf";

export type AlgorithmName = "FCFS" | "LCFS_NP" | "LCFS_P" | "RR" | "SJF";

export type Algorithm = {
  label: string;
  preemptive: boolean;
  run: (table: ProcessTable, config: SimulationConfig) => AlgorithmResult;
};

export const ALGORITHMS: Record<AlgorithmName, Algorithm> = {
  FCFS: {
    label: "FCFS",
    preemptive: false,
    run: fcfs,
  },
  LCFS_NP: {
    label: "LCFS (NP)",
    preemptive: false,
    run: lcfsNonPreemptive,
  },
  LCFS_P: {
    label: "LCFS (P)",
    preemptive: true,
    run: lcfsPreemptive,
  },
  RR: {
    label: "RR",
    preemptive: true,
    run: roundRobin,
  },
  SJF: {
    label: "SJF",
    preemptive: false,
    run: sjf,
  },
};

export const ALGORITHM_NAMES: readonly AlgorithmName[] = [
  "FCFS",
  "LCFS_NP",
  "LCFS_P",
  "RR",
  "SJF",
];
