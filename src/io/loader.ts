import { readFile } from "fs/promises";
import { InputFormatError } from "../core/errors";
import type { ProcessInput } from "../core/table";

const INTEGER = /^-?\d+$/;

function parseInteger(raw: string, line: number, field: string): number {
  const value = raw.trim();
  if (!INTEGER.test(value)) {
    throw new InputFormatError(`${field} is not an integer: "${value}"`, line);
  }

  const parsed = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new InputFormatError(`${field} is out of range: "${value}"`, line);
  }
  return parsed;
}

/**
 * Reads the process file format: a process count on the first line, then
 * one `arrival,burst` pair per line. Blank lines are skipped.
 */
export function parseProcessFile(text: string): ProcessInput[] {
  const lines = text
    .split(/\r?\n/)
    .map((raw, index) => ({ text: raw.trim(), line: index + 1 }))
    .filter((entry) => entry.text !== "");

  if (lines.length === 0) {
    throw new InputFormatError("Missing process count");
  }

  const [header, ...rows] = lines;
  const count = parseInteger(header.text, header.line, "Process count");

  if (count < 0) {
    throw new InputFormatError(`Process count must be >= 0 (got ${count})`, header.line);
  }
  if (rows.length !== count) {
    throw new InputFormatError(`Expected ${count} processes, found ${rows.length}`);
  }

  return rows.map(({ text, line }) => {
    const fields = text.split(",");
    if (fields.length !== 2) {
      throw new InputFormatError(`Expected "arrival,burst", got "${text}"`, line);
    }

    return {
      arrivalTime: parseInteger(fields[0], line, "Arrival time"),
      burstTime: parseInteger(fields[1], line, "Burst time"),
    };
  });
}

export async function loadProcessFile(path: string): Promise<ProcessInput[]> {
  const text = await readFile(path, "utf-8");
  return parseProcessFile(text);
}
