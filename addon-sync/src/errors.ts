export type TreeSyncOperation = "READ_SOURCE" | "STRIP_PREFIX" | "CREATE_DIR" | "COPY_FILE";

export class TreeSyncError extends Error {
  constructor(
    message: string,
    public readonly code: TreeSyncOperation,
    public readonly sourcePath: string,
    public readonly destPath: string | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TreeSyncError";
  }
}

export type AddonSyncErrorCode = "SYNC_FAILED" | "UNKNOWN_ADDON";

export class AddonSyncError extends Error {
  constructor(
    message: string,
    public readonly code: AddonSyncErrorCode,
    public readonly addon: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "AddonSyncError";
  }
}

export class ProjectSpecError extends Error {
  constructor(
    message: string,
    public readonly specPath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ProjectSpecError";
  }
}

/** Message of `err` followed by each `cause` in its chain, one per line. */
export function describeError(err: unknown): string {
  const lines: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = err;
  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    if (current instanceof Error) {
      lines.push(lines.length ? `caused by: ${current.message}` : current.message);
      current = current.cause;
    } else {
      lines.push(lines.length ? `caused by: ${String(current)}` : String(current));
      break;
    }
  }
  return lines.join("\n");
}
