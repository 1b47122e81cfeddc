#!/usr/bin/env node
import { resolveConfig } from "./core/config";
import { SchedulingError } from "./core/errors";
import { createProcessTable } from "./core/table";
import { simulate } from "./engine/simulate";
import { USAGE, UsageError, parseArgs } from "./io/args";
import { loadProcessFile } from "./io/loader";
import { formatReport } from "./io/report";

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const config = resolveConfig(args.overrides);

  const table = createProcessTable(await loadProcessFile(args.input), config);
  const report = simulate(table, config);

  if (args.json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }
  for (const line of formatReport(report, { verbose: args.verbose })) {
    console.log(line);
  }
}

main().catch((e: unknown) => {
  if (e instanceof UsageError) {
    console.error(e.message);
    console.error(USAGE);
  } else if (e instanceof SchedulingError) {
    console.error(`${e.code}: ${e.message}`);
  } else {
    console.error(e);
  }
  process.exit(1);
});
