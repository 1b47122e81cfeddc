export type SchedulingErrorCode =
  | "INVALID_PROCESS_SPEC"
  | "CAPACITY_EXCEEDED"
  | "EMPTY_INPUT"
  | "INVARIANT_VIOLATION"
  | "INVALID_CONFIGURATION"
  | "INPUT_FORMAT";

export class SchedulingError extends Error {
  readonly code: SchedulingErrorCode;

  constructor(code: SchedulingErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidProcessSpec extends SchedulingError {
  readonly index: number;

  constructor(index: number, reason: string) {
    super("INVALID_PROCESS_SPEC", `Process #${index}: ${reason}`);
    this.index = index;
  }
}

export class CapacityExceeded extends SchedulingError {
  readonly count: number;
  readonly capacity: number;

  constructor(count: number, capacity: number) {
    super(
      "CAPACITY_EXCEEDED",
      `Process table holds at most ${capacity} processes (got ${count})`
    );
    this.count = count;
    this.capacity = capacity;
  }
}

export class EmptyInputError extends SchedulingError {
  constructor(message = "Turnaround is undefined for an empty process table") {
    super("EMPTY_INPUT", message);
  }
}

export class SimulationInvariantViolation extends SchedulingError {
  constructor(message: string) {
    super("INVARIANT_VIOLATION", message);
  }
}

export class InvalidConfiguration extends SchedulingError {
  constructor(message: string) {
    super("INVALID_CONFIGURATION", message);
  }
}

export class InputFormatError extends SchedulingError {
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(
      "INPUT_FORMAT",
      line === undefined ? message : `Line ${line}: ${message}`
    );
    this.line = line;
  }
}
