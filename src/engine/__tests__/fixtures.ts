import type { AlgorithmResult } from "../../core/metrics";
import { createProcessTable, type ProcessTable } from "../../core/table";

export function tableOf(...pairs: Array<[number, number]>): ProcessTable {
  return createProcessTable(
    pairs.map(([arrivalTime, burstTime]) => ({ arrivalTime, burstTime }))
  );
}

export function completions(result: AlgorithmResult): number[] {
  return result.outcomes.map((o) => o.completionTime);
}
