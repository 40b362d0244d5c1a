import path from "node:path";

import { loadProjectSpec, resolveSpecPath } from "./config.js";
import { createLogger, createLogSink, type LogSink } from "./logger.js";
import { syncAddons, type SyncAddonsResult } from "./sync/syncAddons.js";
import { hasFlag, pickArg, pickListArg } from "./utils/args.js";

export const USAGE = `usage: addon-sync [--config <file>] [--cwd <dir>] [--addon <name>[,<name>...]] [--dry-run]

  --config <file>   project spec (default: addons.toml, then addons.json)
  --cwd <dir>       working directory all paths resolve against
  --addon <name>    only sync the named addon(s); repeatable
  --dry-run         walk and filter without writing anything`;

type RunSyncCliOpts = {
  argv?: string[];
  cwd?: string;
  log?: LogSink;
};

export async function runSyncCli(opts?: RunSyncCliOpts): Promise<SyncAddonsResult> {
  const argv = opts?.argv ?? process.argv.slice(2);
  const workingDir = path.resolve(opts?.cwd ?? process.cwd(), pickArg(argv, "--cwd") ?? ".");
  const specPath = resolveSpecPath(workingDir, pickArg(argv, "--config"));
  const only = pickListArg(argv, "--addon");
  const dryRun = hasFlag(argv, "--dry-run");

  const log = opts?.log ?? createLogSink(createLogger());

  const spec = await loadProjectSpec(specPath);
  log.info("project spec loaded", { spec: specPath, addons: spec.addons.length, projectPath: spec.projectPath });

  const result = syncAddons({ spec, workingDir, log, only, dryRun });

  const synced = result.addons.filter((a) => a.status === "synced").length;
  const missing = result.addons.length - synced;
  log.info(dryRun ? "dry run complete" : "sync complete", { dest: result.destBase, synced, missing });
  return result;
}
