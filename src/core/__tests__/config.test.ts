import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, resolveConfig } from "../config";
import { InvalidConfiguration } from "../errors";

describe("resolveConfig", () => {
  it("falls back to the defaults", () => {
    expect(resolveConfig()).toEqual({ quantum: 2, maxProcesses: 100 });
    expect(resolveConfig()).not.toBe(DEFAULT_CONFIG);
  });

  it("merges partial overrides", () => {
    expect(resolveConfig({ quantum: 5 })).toEqual({ quantum: 5, maxProcesses: 100 });
  });

  it.each([0, -2, 1.5, Number.NaN, 2 ** 53])("rejects quantum %s", (quantum) => {
    expect(() => resolveConfig({ quantum })).toThrow(InvalidConfiguration);
  });

  it("rejects a non-positive capacity", () => {
    expect(() => resolveConfig({ maxProcesses: 0 })).toThrow(
      "maxProcesses must be a positive integer (got 0)"
    );
  });
});
