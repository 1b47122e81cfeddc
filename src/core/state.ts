import type { Process } from "./process";

export type ExecutionSlice = {
  /** `null` while the CPU sits idle. */
  processId: number | null;
  start: number;
  end: number;
};

export type RunState = {
  time: number;

  processes: Process[];
  completed: number;

  /** Last process given the CPU, until it completes or is displaced. */
  running: Process | null;

  timeline: ExecutionSlice[];
};
