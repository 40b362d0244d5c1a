/**
 * Split a relative path into components. Both `/` and `\` separate; empty and
 * `.` components are dropped, so `addons/`, `./addons` and `addons` compare equal.
 */
export function splitRelPath(p: string): string[] {
  return p
    .split(/[\\/]+/)
    .filter((part) => part !== "" && part !== ".");
}

/** True when `target` equals `prefix` or lies beneath it, compared per component. */
export function isPathPrefix(prefix: readonly string[], target: readonly string[]): boolean {
  if (prefix.length > target.length) return false;
  for (let i = 0; i < prefix.length; i++) {
    if (prefix[i] !== target[i]) return false;
  }
  return true;
}

export type PathRules = {
  includes?: readonly string[] | null;
  excludes?: readonly string[] | null;
};

/**
 * Decide whether `relPath` (relative to the source base) takes part in a sync.
 *
 * Excludes win over includes. With includes, a path passes when it is inside an
 * included subtree or is an ancestor directory of one, so the directories
 * leading down to an included leaf still get visited.
 */
export function shouldInclude(
  relPath: string,
  excludes?: readonly string[] | null,
  includes?: readonly string[] | null,
): boolean {
  return compilePathFilter({ includes, excludes })(relPath);
}

/** Pre-split rules for filtering many paths against the same include/exclude set. */
export function compilePathFilter(rules: PathRules): (relPath: string) => boolean {
  const excludes = rules.excludes ? rules.excludes.map(splitRelPath) : null;
  const includes = rules.includes ? rules.includes.map(splitRelPath) : null;

  return (relPath) => {
    const rel = splitRelPath(relPath);
    if (excludes?.some((ex) => isPathPrefix(ex, rel))) return false;
    if (includes) {
      return includes.some((inc) => isPathPrefix(inc, rel) || isPathPrefix(rel, inc));
    }
    return true;
  };
}
