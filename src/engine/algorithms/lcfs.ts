import type { AlgorithmResult } from "../../core/metrics";
import type { Process } from "../../core/process";
import type { ProcessTable } from "../../core/table";
import {
  admitArrivals,
  execute,
  finishRun,
  idleUntilNextArrival,
  startRun,
} from "../run";

// Arrivals are pushed in arrival order, so the latest arrival sits on top.

export function lcfsNonPreemptive(table: ProcessTable): AlgorithmResult {
  const run = startRun(table);
  const stack: Process[] = [];

  while (run.completed < run.processes.length) {
    admitArrivals(run, (p) => stack.push(p));

    const top = stack.pop();
    if (top === undefined) {
      if (!idleUntilNextArrival(run)) break;
      continue;
    }

    execute(run, top, top.remainingTime);
  }

  return finishRun(run);
}

export function lcfsPreemptive(table: ProcessTable): AlgorithmResult {
  const run = startRun(table);
  const stack: Process[] = [];

  while (run.completed < run.processes.length) {
    // a newcomer lands above whatever was running and takes the next unit
    admitArrivals(run, (p) => stack.push(p));

    const top = stack[stack.length - 1];
    if (top === undefined) {
      if (!idleUntilNextArrival(run)) break;
      continue;
    }

    execute(run, top, 1);
    if (top.status === "completed") stack.pop();
  }

  return finishRun(run);
}
