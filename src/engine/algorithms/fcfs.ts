import type { AlgorithmResult } from "../../core/metrics";
import type { ProcessTable } from "../../core/table";
import { execute, finishRun, idleUntil, startRun } from "../run";

export function fcfs(table: ProcessTable): AlgorithmResult {
  const run = startRun(table);

  for (const p of run.processes) {
    idleUntil(run, p.arrivalTime);
    execute(run, p, p.remainingTime);
  }

  return finishRun(run);
}
