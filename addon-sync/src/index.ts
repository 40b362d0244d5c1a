#!/usr/bin/env node
import { describeError } from "./errors.js";
import { runSyncCli, USAGE } from "./runSyncCli.js";

async function main() {
  const argv = process.argv.slice(2);
  if (argv.includes("--help") || argv.includes("-h")) {
    console.log(USAGE);
    return;
  }
  await runSyncCli({ argv });
}

main().catch((err) => {
  console.error(`[addon-sync] fatal: ${describeError(err)}`);
  process.exitCode = 1;
});
