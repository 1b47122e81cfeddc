import type { ExecutionSlice } from "./state";

export type ProcessOutcome = {
  id: number;
  arrivalTime: number;
  burstTime: number;
  completionTime: number;
  turnaroundTime: number;
  waitingTime: number;
};

export type AlgorithmResult = {
  outcomes: ProcessOutcome[];
  timeline: ExecutionSlice[];

  meanTurnaround: number;
  meanWaiting: number;
};
