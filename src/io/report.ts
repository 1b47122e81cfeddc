import type { AlgorithmResult } from "../core/metrics";
import type { ExecutionSlice } from "../core/state";
import { ALGORITHMS, ALGORITHM_NAMES } from "../engine/policy";
import type { SimulationReport } from "../engine/simulate";

export type ReportOptions = {
  verbose?: boolean;
};

function formatSlice(slice: ExecutionSlice): string {
  const who = slice.processId === null ? "idle" : `#${slice.processId}`;
  return `[${slice.start}-${slice.end} ${who}]`;
}

function formatDetails(label: string, result: AlgorithmResult): string[] {
  const lines = [`${label} (mean waiting = ${result.meanWaiting.toFixed(2)})`];

  for (const o of result.outcomes) {
    lines.push(
      `  #${o.id} arrival=${o.arrivalTime} burst=${o.burstTime} ` +
        `completion=${o.completionTime} turnaround=${o.turnaroundTime} waiting=${o.waitingTime}`
    );
  }
  lines.push(`  timeline: ${result.timeline.map(formatSlice).join(" ")}`);

  return lines;
}

export function formatReport(
  report: SimulationReport,
  options: ReportOptions = {}
): string[] {
  const lines = ALGORITHM_NAMES.map(
    (name) =>
      `${ALGORITHMS[name].label}: mean turnaround = ${report.meanTurnaround[name].toFixed(2)}`
  );

  if (!options.verbose) return lines;

  lines.push("", `quantum = ${report.config.quantum}`);
  for (const name of ALGORITHM_NAMES) {
    lines.push("", ...formatDetails(ALGORITHMS[name].label, report.runs[name]));
  }

  return lines;
}
