import { describe, expect, it } from "vitest";

import { createGlobMatcher, createPathFilter } from "../../../src/code/filters/glob.js";

describe("createGlobMatcher", () => {
  it("should match nested paths with globstar", () => {
    const isMatch = createGlobMatcher("src/**/*.ts");

    expect(isMatch("src/code/ledger/ownership-table.ts")).toBe(true);
    expect(isMatch("src/index.ts")).toBe(true);
    expect(isMatch("docs/guide.md")).toBe(false);
  });

  it("should support brace expansion", () => {
    const isMatch = createGlobMatcher("{lib,bin}/**");

    expect(isMatch("lib/a.js")).toBe(true);
    expect(isMatch("bin/cli")).toBe(true);
    expect(isMatch("src/a.js")).toBe(false);
  });
});

describe("createPathFilter", () => {
  it("should accept every path without a pattern", () => {
    const accepts = createPathFilter();

    expect(accepts("anything/at/all.txt")).toBe(true);
  });

  it("should treat an empty pattern as no pattern", () => {
    expect(createPathFilter("")("a.txt")).toBe(true);
  });

  it("should filter by the given pattern", () => {
    const accepts = createPathFilter("*.md");

    expect(accepts("README.md")).toBe(true);
    expect(accepts("src/a.ts")).toBe(false);
  });
});
