import type { AlgorithmResult } from "../../core/metrics";
import type { Process } from "../../core/process";
import type { ProcessTable } from "../../core/table";
import {
  execute,
  finishRun,
  idleUntilNextArrival,
  isReady,
  startRun,
} from "../run";

function shortestReady(
  processes: Process[],
  time: number
): Process | undefined {
  let shortest: Process | undefined;

  // processes are in arrival order, so strict < keeps the earliest on ties
  for (const p of processes) {
    if (!isReady(p, time)) continue;
    if (shortest === undefined || p.remainingTime < shortest.remainingTime) {
      shortest = p;
    }
  }

  return shortest;
}

export function sjf(table: ProcessTable): AlgorithmResult {
  const run = startRun(table);

  while (run.completed < run.processes.length) {
    const next = shortestReady(run.processes, run.time);

    if (next === undefined) {
      if (!idleUntilNextArrival(run)) break;
      continue;
    }

    execute(run, next, next.remainingTime);
  }

  return finishRun(run);
}
