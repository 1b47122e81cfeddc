import { describe, it, expect } from "vitest";
import { fcfs } from "../algorithms/fcfs";
import { sjf } from "../algorithms/sjf";
import { completions, tableOf } from "./fixtures";

describe("sjf", () => {
  it("matches fcfs when the long job is already running", () => {
    const table = tableOf([0, 10], [1, 1], [2, 1]);
    expect(completions(sjf(table))).toEqual([10, 11, 12]);
    expect(sjf(table).meanTurnaround).toBe(fcfs(table).meanTurnaround);
  });

  it("picks the shortest ready job at each decision point", () => {
    const result = sjf(tableOf([0, 3], [1, 2], [1, 2], [2, 1]));
    expect(completions(result)).toEqual([3, 6, 8, 4]);
  });

  it("breaks ties by arrival, then input order", () => {
    const result = sjf(tableOf([2, 2], [0, 4], [2, 2], [1, 2]));
    // #1 runs 0-4; #3 arrived earliest among the 2-unit jobs
    expect(completions(result)).toEqual([8, 4, 10, 6]);
  });

  it("idles until a late arrival", () => {
    expect(completions(sjf(tableOf([5, 3])))).toEqual([8]);
  });
});
