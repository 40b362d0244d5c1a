import { describe, expect, it } from "vitest";

import { compilePathFilter, isPathPrefix, shouldInclude, splitRelPath } from "./pathFilter.js";

describe("sync/pathFilter splitRelPath", () => {
  it("drops empty and dot components", () => {
    expect(splitRelPath("./addons//foo/")).toEqual(["addons", "foo"]);
    expect(splitRelPath("")).toEqual([]);
  });

  it("splits on both separators", () => {
    expect(splitRelPath("addons\\foo/plugin.cfg")).toEqual(["addons", "foo", "plugin.cfg"]);
  });
});

describe("sync/pathFilter isPathPrefix", () => {
  it("matches equal and nested paths", () => {
    expect(isPathPrefix(["addons"], ["addons"])).toBe(true);
    expect(isPathPrefix(["addons"], ["addons", "foo"])).toBe(true);
    expect(isPathPrefix([], ["addons"])).toBe(true);
  });

  it("compares whole components", () => {
    expect(isPathPrefix(["addons"], ["addons2"])).toBe(false);
    expect(isPathPrefix(["addons", "foo"], ["addons"])).toBe(false);
  });
});

describe("sync/pathFilter shouldInclude", () => {
  it("includes everything without rules", () => {
    expect(shouldInclude("")).toBe(true);
    expect(shouldInclude("notes.txt")).toBe(true);
    expect(shouldInclude("a/b/c", null, null)).toBe(true);
  });

  it("rejects excluded paths and their descendants", () => {
    expect(shouldInclude("secret.txt", ["secret.txt"])).toBe(false);
    expect(shouldInclude("build/out/a.bin", ["build"])).toBe(false);
    expect(shouldInclude("builder/a.bin", ["build"])).toBe(true);
  });

  it("lets exclude win over a matching include", () => {
    expect(shouldInclude("addons/foo/tests/t.gd", ["addons/foo/tests"], ["addons"])).toBe(false);
    expect(shouldInclude("addons/foo/plugin.cfg", ["addons/foo/tests"], ["addons"])).toBe(true);
  });

  it("includes paths inside an included subtree", () => {
    expect(shouldInclude("addons", null, ["addons"])).toBe(true);
    expect(shouldInclude("addons/foo/plugin.cfg", null, ["addons"])).toBe(true);
    expect(shouldInclude("notes.txt", null, ["addons"])).toBe(false);
  });

  it("includes ancestors of an included subtree", () => {
    const includes = ["addons/foo"];
    expect(shouldInclude("", null, includes)).toBe(true);
    expect(shouldInclude("addons", null, includes)).toBe(true);
    expect(shouldInclude("addons/bar", null, includes)).toBe(false);
  });

  it("does not match on raw string prefixes", () => {
    expect(shouldInclude("addons2/x.txt", null, ["addons"])).toBe(false);
    expect(shouldInclude("add", null, ["addons"])).toBe(false);
  });

  it("treats trailing slashes and leading ./ in rules as the same path", () => {
    expect(shouldInclude("addons/foo", null, ["./addons/"])).toBe(true);
    expect(shouldInclude("secret.txt", ["./secret.txt"])).toBe(false);
  });

  it("rejects everything, root included, for an empty include list", () => {
    expect(shouldInclude("", null, [])).toBe(false);
    expect(shouldInclude("addons", null, [])).toBe(false);
  });

  it("still rejects the root when it is itself excluded", () => {
    expect(shouldInclude("", [""], ["addons"])).toBe(false);
  });
});

describe("sync/pathFilter compilePathFilter", () => {
  it("reuses one rule set across many paths", () => {
    const accept = compilePathFilter({ includes: ["addons", "docs/readme.md"], excludes: ["addons/foo/tests"] });
    expect(
      ["", "addons", "addons/foo", "addons/foo/tests", "addons/foo/tests/a.gd", "docs", "docs/readme.md", "docs/other.md", "notes.txt"].map(
        (p) => [p, accept(p)],
      ),
    ).toEqual([
      ["", true],
      ["addons", true],
      ["addons/foo", true],
      ["addons/foo/tests", false],
      ["addons/foo/tests/a.gd", false],
      ["docs", true],
      ["docs/readme.md", true],
      ["docs/other.md", false],
      ["notes.txt", false],
    ]);
  });
});
