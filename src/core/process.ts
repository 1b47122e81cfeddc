export type ProcessStatus = "not_arrived" | "ready" | "running" | "completed";

export type ProcessSpec = {
  readonly id: number;
  readonly arrivalTime: number;
  readonly burstTime: number;
};

export type Process = {
  id: number;
  arrivalTime: number;
  burstTime: number;
  remainingTime: number;
  completionTime?: number;
  status: ProcessStatus;
};

export function cloneProcess(row: ProcessSpec): Process {
  return {
    id: row.id,
    arrivalTime: row.arrivalTime,
    burstTime: row.burstTime,
    remainingTime: row.burstTime,
    status: "not_arrived",
  };
}
