import { DEFAULT_CONFIG, type SimulationConfig } from "./config";
import { CapacityExceeded, InvalidProcessSpec } from "./errors";
import type { ProcessSpec } from "./process";

export type ProcessInput = {
  arrivalTime: number;
  burstTime: number;
};

export type ProcessTable = {
  readonly processes: readonly ProcessSpec[];
};

function validate(input: ProcessInput, index: number): ProcessSpec {
  const { arrivalTime, burstTime } = input;

  if (!Number.isSafeInteger(arrivalTime) || arrivalTime < 0) {
    throw new InvalidProcessSpec(
      index,
      `arrival time must be an integer >= 0 (got ${arrivalTime})`
    );
  }
  if (!Number.isSafeInteger(burstTime) || burstTime <= 0) {
    throw new InvalidProcessSpec(
      index,
      `burst time must be an integer > 0 (got ${burstTime})`
    );
  }

  return Object.freeze({ id: index, arrivalTime, burstTime });
}

// the clock can reach the latest arrival plus every burst
function checkHorizon(rows: readonly ProcessSpec[]) {
  let latest = 0;
  let work = 0;

  rows.forEach((row, index) => {
    latest = Math.max(latest, row.arrivalTime);
    work += row.burstTime;
    if (!Number.isSafeInteger(latest + work)) {
      throw new InvalidProcessSpec(
        index,
        `schedule would run past ${Number.MAX_SAFE_INTEGER}`
      );
    }
  });
}

export function createProcessTable(
  inputs: readonly ProcessInput[],
  config: Pick<SimulationConfig, "maxProcesses"> = DEFAULT_CONFIG
): ProcessTable {
  if (inputs.length > config.maxProcesses) {
    throw new CapacityExceeded(inputs.length, config.maxProcesses);
  }

  const processes = inputs.map(validate);
  checkHorizon(processes);

  return Object.freeze({ processes: Object.freeze(processes) });
}
