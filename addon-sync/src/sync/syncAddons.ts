import { existsSync } from "node:fs";
import path from "node:path";

import type { AddonSpec, ProjectSpec } from "../config.js";
import { AddonSyncError } from "../errors.js";
import type { LogSink } from "../logger.js";
import { syncTree, type SyncTreeResult } from "./treeSync.js";

export type AddonOutcome =
  | { addon: string; status: "synced"; sourceBase: string; destBase: string; result: SyncTreeResult }
  | { addon: string; status: "missing_source"; sourceBase: string };

export type SyncAddonsResult = {
  destBase: string;
  addons: AddonOutcome[];
};

export type SyncAddonsOptions = {
  spec: ProjectSpec;
  workingDir: string;
  log: LogSink;
  only?: readonly string[] | null;
  dryRun?: boolean;
};

function selectAddons(spec: ProjectSpec, only: readonly string[] | null | undefined): AddonSpec[] {
  if (!only?.length) return spec.addons;
  const known = new Set(spec.addons.map((a) => a.name));
  for (const name of only) {
    if (!known.has(name)) {
      throw new AddonSyncError(`unknown addon: ${name}`, "UNKNOWN_ADDON", name);
    }
  }
  const wanted = new Set(only);
  return spec.addons.filter((a) => wanted.has(a.name));
}

/**
 * Run one tree sync per addon, in declaration order, into the shared project
 * path. An addon whose source is missing is skipped with a warning; the first
 * fatal sync error stops the remaining addons.
 */
export function syncAddons(opts: SyncAddonsOptions): SyncAddonsResult {
  const workingDir = path.resolve(opts.workingDir);
  const destBase = path.resolve(workingDir, opts.spec.projectPath);
  const addons = selectAddons(opts.spec, opts.only);
  const outcomes: AddonOutcome[] = [];

  for (const addon of addons) {
    const sourceBase = path.resolve(workingDir, addon.path ?? ".");

    if (!existsSync(sourceBase)) {
      opts.log.warn("addon source does not exist, skipping", { addon: addon.name, path: sourceBase });
      outcomes.push({ addon: addon.name, status: "missing_source", sourceBase });
      continue;
    }

    const startedAt = Date.now();
    opts.log.info("addon sync start", { addon: addon.name, source: sourceBase, dest: destBase, dryRun: !!opts.dryRun });

    let result: SyncTreeResult;
    try {
      result = syncTree({
        sourceBase,
        destBase,
        includes: addon.include,
        excludes: addon.exclude,
        log: opts.log,
        dryRun: opts.dryRun,
      });
    } catch (err) {
      throw new AddonSyncError(`failed to sync addon ${addon.name}`, "SYNC_FAILED", addon.name, { cause: err });
    }

    opts.log.info("addon sync done", {
      addon: addon.name,
      directories: result.directories,
      files: result.files,
      filtered: result.filtered,
      skipped: result.skipped.length,
      ms: Date.now() - startedAt,
    });
    outcomes.push({ addon: addon.name, status: "synced", sourceBase, destBase, result });
  }

  return { destBase, addons: outcomes };
}
