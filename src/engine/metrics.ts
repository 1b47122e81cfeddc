import { EmptyInputError, SimulationInvariantViolation } from "../core/errors";
import type { ProcessOutcome } from "../core/metrics";
import type { Process } from "../core/process";

function completionOf(process: Process): number {
  if (process.completionTime === undefined) {
    throw new SimulationInvariantViolation(
      `Process #${process.id} has no completion time`
    );
  }
  return process.completionTime;
}

function mean(values: number[]): number {
  if (values.length === 0) throw new EmptyInputError();
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function meanTurnaround(processes: readonly Process[]): number {
  return mean(processes.map((p) => completionOf(p) - p.arrivalTime));
}

export function meanWaiting(processes: readonly Process[]): number {
  return mean(
    processes.map((p) => completionOf(p) - p.arrivalTime - p.burstTime)
  );
}

export function toOutcome(process: Process): ProcessOutcome {
  const completionTime = completionOf(process);
  const turnaroundTime = completionTime - process.arrivalTime;

  return {
    id: process.id,
    arrivalTime: process.arrivalTime,
    burstTime: process.burstTime,
    completionTime,
    turnaroundTime,
    waitingTime: turnaroundTime - process.burstTime,
  };
}
