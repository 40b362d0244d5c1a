import { copyFileSync, mkdirSync, readdirSync, statSync, type Dirent } from "node:fs";
import path from "node:path";

import { TreeSyncError } from "../errors.js";
import { silentLogSink, type LogSink } from "../logger.js";
import { compilePathFilter } from "./pathFilter.js";

export type SkippedEntry = {
  path: string;
  error: string;
};

export type SyncTreeResult = {
  directories: number;
  files: number;
  filtered: number;
  skipped: SkippedEntry[];
};

export type SyncTreeOptions = {
  sourceBase: string;
  destBase: string;
  includes?: readonly string[] | null;
  excludes?: readonly string[] | null;
  log?: LogSink;
  dryRun?: boolean;
};

type EntryKind = "dir" | "file";

function relativeToBase(sourceBase: string, absPath: string): string {
  const rel = path.relative(sourceBase, absPath);
  if (rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    throw new TreeSyncError(
      `${absPath} is not under source base ${sourceBase}`,
      "STRIP_PREFIX",
      absPath,
      null,
    );
  }
  return rel;
}

// Links are never descended into; a link to a directory is recreated as a plain directory.
function kindOf(absPath: string, ent: Dirent): { kind: EntryKind; descend: boolean } {
  if (ent.isSymbolicLink()) {
    try {
      return { kind: statSync(absPath).isDirectory() ? "dir" : "file", descend: false };
    } catch {
      return { kind: "file", descend: false };
    }
  }
  const isDir = ent.isDirectory();
  return { kind: isDir ? "dir" : "file", descend: isDir };
}

function ensureDir(dir: string, sourcePath: string): void {
  try {
    mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new TreeSyncError(`Failed to create directory ${dir}`, "CREATE_DIR", sourcePath, dir, {
      cause: err,
    });
  }
}

function copyFile(from: string, to: string): void {
  try {
    copyFileSync(from, to);
  } catch (err) {
    throw new TreeSyncError(`Failed to copy ${from} to ${to}`, "COPY_FILE", from, to, { cause: err });
  }
}

/**
 * Copy the entries of `sourceBase` that pass the include/exclude rules into
 * `destBase`. Existing destination files are overwritten; nothing is deleted.
 */
export function syncTree(opts: SyncTreeOptions): SyncTreeResult {
  const sourceBase = path.resolve(opts.sourceBase);
  const destBase = path.resolve(opts.destBase);
  const log = opts.log ?? silentLogSink;
  const dryRun = opts.dryRun ?? false;
  const accept = compilePathFilter({ includes: opts.includes, excludes: opts.excludes });

  const result: SyncTreeResult = { directories: 0, files: 0, filtered: 0, skipped: [] };

  let rootIsDir: boolean;
  try {
    rootIsDir = statSync(sourceBase).isDirectory();
  } catch (err) {
    throw new TreeSyncError(`Failed to read source ${sourceBase}`, "READ_SOURCE", sourceBase, null, {
      cause: err,
    });
  }

  const visit = (absPath: string, kind: EntryKind, descend: boolean): void => {
    const rel = relativeToBase(sourceBase, absPath);
    if (!accept(rel)) {
      result.filtered += 1;
      // Every descendant of a rejected entry is rejected by the same rule.
      return;
    }

    const target = path.join(destBase, rel);
    if (kind === "dir") {
      if (!dryRun) ensureDir(target, absPath);
      result.directories += 1;
    } else {
      if (!dryRun) {
        ensureDir(path.dirname(target), absPath);
        copyFile(absPath, target);
      }
      result.files += 1;
    }

    if (!descend) return;

    let children: Dirent[];
    try {
      children = readdirSync(absPath, { withFileTypes: true });
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      result.skipped.push({ path: absPath, error });
      log.warn("skipping unreadable directory", { path: absPath, err: error });
      return;
    }
    children.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const ent of children) {
      const child = path.join(absPath, ent.name);
      const { kind: childKind, descend: childDescend } = kindOf(child, ent);
      visit(child, childKind, childDescend);
    }
  };

  visit(sourceBase, rootIsDir ? "dir" : "file", rootIsDir);
  return result;
}
