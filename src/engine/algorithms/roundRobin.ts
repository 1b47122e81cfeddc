import type { SimulationConfig } from "../../core/config";
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

export function roundRobin(
  table: ProcessTable,
  config: Pick<SimulationConfig, "quantum">
): AlgorithmResult {
  const { quantum } = config;
  const run = startRun(table);
  const queue: Process[] = [];
  const enqueue = (p: Process) => queue.push(p);

  while (run.completed < run.processes.length) {
    admitArrivals(run, enqueue);

    const front = queue.shift();
    if (front === undefined) {
      if (!idleUntilNextArrival(run)) break;
      continue;
    }

    if (front.remainingTime <= quantum) {
      execute(run, front, front.remainingTime);
      continue;
    }

    execute(run, front, quantum);

    // arrivals during the slice go ahead of the preempted process
    admitArrivals(run, enqueue);
    queue.push(front);
  }

  return finishRun(run);
}
