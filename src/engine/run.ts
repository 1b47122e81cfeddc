import { SimulationInvariantViolation } from "../core/errors";
import type { AlgorithmResult } from "../core/metrics";
import { type Process, cloneProcess } from "../core/process";
import type { RunState } from "../core/state";
import type { ProcessTable } from "../core/table";
import { meanTurnaround, meanWaiting, toOutcome } from "./metrics";
import { orderProcesses } from "./ordering";

export function startRun(table: ProcessTable): RunState {
  return {
    time: 0,
    processes: orderProcesses(table.processes.map(cloneProcess), "arrival"),
    completed: 0,
    running: null,
    timeline: [],
  };
}

export function isReady(process: Process, time: number): boolean {
  return process.arrivalTime <= time && process.status !== "completed";
}

/**
 * Hands every process that has arrived by `run.time` and was never admitted
 * to `admit`, in arrival order. Admission is one-way: an admitted process
 * never returns to `not_arrived`.
 */
export function admitArrivals(
  run: RunState,
  admit: (process: Process) => void
): void {
  for (const p of run.processes) {
    if (p.status === "not_arrived" && p.arrivalTime <= run.time) {
      p.status = "ready";
      admit(p);
    }
  }
}

function release(run: RunState) {
  if (run.running !== null && run.running.status === "running") {
    run.running.status = "ready";
  }
  run.running = null;
}

function record(run: RunState, processId: number | null, end: number) {
  const last = run.timeline[run.timeline.length - 1];

  if (
    last !== undefined &&
    last.processId === processId &&
    last.end === run.time
  ) {
    last.end = end;
  } else {
    run.timeline.push({ processId, start: run.time, end });
  }
}

export function execute(run: RunState, process: Process, units: number): void {
  if (process.status === "completed") {
    throw new SimulationInvariantViolation(
      `Process #${process.id} scheduled after it completed`
    );
  }
  if (!Number.isInteger(units) || units <= 0 || units > process.remainingTime) {
    throw new SimulationInvariantViolation(
      `Process #${process.id} cannot run ${units} of ${process.remainingTime} remaining units`
    );
  }
  if (process.arrivalTime > run.time) {
    throw new SimulationInvariantViolation(
      `Process #${process.id} scheduled at ${run.time} before its arrival at ${process.arrivalTime}`
    );
  }

  if (run.running !== process) release(run);
  process.status = "running";
  run.running = process;

  record(run, process.id, run.time + units);
  run.time += units;
  process.remainingTime -= units;

  if (process.remainingTime > 0) return;

  process.status = "completed";
  run.running = null;
  process.completionTime = run.time;
  run.completed++;

  if (run.completed > run.processes.length) {
    throw new SimulationInvariantViolation(
      `Completed ${run.completed} processes out of ${run.processes.length}`
    );
  }
  if (run.time - process.arrivalTime < process.burstTime) {
    throw new SimulationInvariantViolation(
      `Process #${process.id} completed at ${run.time}, sooner than its burst allows`
    );
  }
}

export function idleUntil(run: RunState, time: number): void {
  if (time <= run.time) return;

  release(run);
  record(run, null, time);
  run.time = time;
}

/**
 * Jumps the clock to the next pending arrival. Returns `false` once every
 * process has completed.
 */
export function idleUntilNextArrival(run: RunState): boolean {
  let next: number | undefined;

  for (const p of run.processes) {
    if (
      p.status !== "completed" &&
      p.arrivalTime > run.time &&
      (next === undefined || p.arrivalTime < next)
    ) {
      next = p.arrivalTime;
    }
  }

  if (next !== undefined) {
    idleUntil(run, next);
    return true;
  }

  if (run.completed < run.processes.length) {
    throw new SimulationInvariantViolation(
      `No pending arrival after ${run.time} with ${run.processes.length - run.completed} processes unfinished`
    );
  }
  return false;
}

export function finishRun(run: RunState): AlgorithmResult {
  if (run.completed !== run.processes.length) {
    throw new SimulationInvariantViolation(
      `Run ended with ${run.completed} of ${run.processes.length} processes completed`
    );
  }

  return {
    outcomes: [...run.processes].sort((a, b) => a.id - b.id).map(toOutcome),
    timeline: run.timeline,
    meanTurnaround: meanTurnaround(run.processes),
    meanWaiting: meanWaiting(run.processes),
  };
}
