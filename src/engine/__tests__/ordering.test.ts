import { describe, it, expect } from "vitest";
import { orderProcesses, sortBy } from "../ordering";

describe("sortBy", () => {
  it("orders ascending by the key", () => {
    expect(sortBy([5, 1, 4, 2], (n) => n)).toEqual([1, 2, 4, 5]);
  });

  it("keeps input order among equal keys", () => {
    const items = [
      { name: "a", key: 2 },
      { name: "b", key: 1 },
      { name: "c", key: 2 },
      { name: "d", key: 1 },
    ];
    expect(sortBy(items, (i) => i.key).map((i) => i.name)).toEqual([
      "b",
      "d",
      "a",
      "c",
    ]);
  });

  it("does not mutate its input", () => {
    const items = [3, 2, 1];
    const sorted = sortBy(items, (n) => n);
    expect(items).toEqual([3, 2, 1]);
    expect(sorted).not.toBe(items);
  });
});

describe("orderProcesses", () => {
  const rows = [
    { id: 0, arrivalTime: 4, burstTime: 1 },
    { id: 1, arrivalTime: 0, burstTime: 3 },
    { id: 2, arrivalTime: 4, burstTime: 2 },
    { id: 3, arrivalTime: 1, burstTime: 1 },
  ];

  it("orders by arrival time", () => {
    expect(orderProcesses(rows, "arrival").map((r) => r.id)).toEqual([1, 3, 0, 2]);
  });

  it("orders by burst time", () => {
    expect(orderProcesses(rows, "burst").map((r) => r.id)).toEqual([0, 3, 2, 1]);
  });
});
