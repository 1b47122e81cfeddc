import { describe, it, expect } from "vitest";
import { EmptyInputError, SimulationInvariantViolation } from "../../core/errors";
import type { Process } from "../../core/process";
import { meanTurnaround, meanWaiting, toOutcome } from "../metrics";

function finished(
  id: number,
  arrivalTime: number,
  burstTime: number,
  completionTime: number
): Process {
  return {
    id,
    arrivalTime,
    burstTime,
    remainingTime: 0,
    completionTime,
    status: "completed",
  };
}

describe("meanTurnaround", () => {
  it("averages completion minus arrival", () => {
    const processes = [finished(0, 0, 5, 5), finished(1, 2, 1, 9)];
    expect(meanTurnaround(processes)).toBe(6);
  });

  it("fails on an empty set", () => {
    expect(() => meanTurnaround([])).toThrow(EmptyInputError);
  });

  it("fails when a process never completed", () => {
    const pending: Process = {
      id: 3,
      arrivalTime: 0,
      burstTime: 2,
      remainingTime: 2,
      status: "ready",
    };
    expect(() => meanTurnaround([pending])).toThrow(SimulationInvariantViolation);
  });
});

describe("meanWaiting", () => {
  it("averages turnaround minus burst", () => {
    const processes = [finished(0, 0, 5, 5), finished(1, 2, 1, 9)];
    expect(meanWaiting(processes)).toBe(3);
  });

  it("fails on an empty set", () => {
    expect(() => meanWaiting([])).toThrow(EmptyInputError);
  });
});

describe("toOutcome", () => {
  it("derives turnaround and waiting times", () => {
    expect(toOutcome(finished(1, 2, 1, 9))).toEqual({
      id: 1,
      arrivalTime: 2,
      burstTime: 1,
      completionTime: 9,
      turnaroundTime: 7,
      waitingTime: 6,
    });
  });
});
