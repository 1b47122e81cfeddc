// core
export * from "./core/process";
export * from "./core/table";
export * from "./core/config";
export * from "./core/errors";

// engine
export * from "./engine/ordering";
export * from "./engine/metrics";
export * from "./engine/policy";
export * from "./engine/simulate";
export * from "./engine/algorithms/fcfs";
export * from "./engine/algorithms/lcfs";
export * from "./engine/algorithms/roundRobin";
export * from "./engine/algorithms/sjf";

// io
export * from "./io/loader";
export * from "./io/report";

// types
export type { ExecutionSlice, RunState } from "./core/state";
export type { AlgorithmResult, ProcessOutcome } from "./core/metrics";
