import { describe, expect, it } from "vitest";

import { MalformedDiffEventError } from "../../../src/code/errors.js";
import type { FileChangeEvent } from "../../../src/code/git/types.js";
import { validateChange } from "../../../src/code/pipeline/event-schema.js";
import { hunk } from "../../helpers/history.js";

const HASH = "e".repeat(40);

function issuesOf(event: FileChangeEvent): string[] {
  try {
    validateChange(HASH, event);
  } catch (error) {
    if (error instanceof MalformedDiffEventError) return error.issues;
    throw error;
  }
  return [];
}

describe("validateChange", () => {
  it("should accept a well-formed modification", () => {
    const event: FileChangeEvent = {
      kind: "modify",
      path: "f.txt",
      oldLineCount: 4,
      newLineCount: 5,
      binary: false,
      hunks: [hunk(1, 1, 1, 1), hunk(4, 0, 5, 1)],
    };

    expect(validateChange(HASH, event)).toEqual(event);
  });

  it("should report mismatched line prefixes against the header", () => {
    const issues = issuesOf({
      kind: "modify",
      path: "f.txt",
      oldLineCount: 3,
      newLineCount: 3,
      binary: false,
      hunks: [{ oldStart: 1, oldCount: 1, newStart: 1, newCount: 1, lines: ["-a", "-b", "+c"] }],
    });

    expect(issues).toContain("hunks.0: 2 removed line(s), header says 1");
  });

  it("should report overlapping hunks", () => {
    const issues = issuesOf({
      kind: "modify",
      path: "f.txt",
      oldLineCount: 5,
      newLineCount: 5,
      binary: false,
      hunks: [hunk(2, 2, 2, 2), hunk(3, 1, 3, 1)],
    });

    expect(issues).toContain("hunks.1: hunks must be ascending and non-overlapping");
  });

  it("should report an added file with parent lines", () => {
    const issues = issuesOf({ kind: "add", path: "f.txt", oldLineCount: 2, newLineCount: 2, binary: false, hunks: [] });

    expect(issues).toContain("oldLineCount: added file must have no parent lines");
  });

  it("should report a rename similarity out of range", () => {
    const issues = issuesOf({
      kind: "rename",
      oldPath: "a.txt",
      newPath: "b.txt",
      similarity: 140,
      oldLineCount: 1,
      newLineCount: 1,
      binary: false,
      hunks: [],
    });

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^similarity: /);
  });

  it("should not inspect hunks of binary changes", () => {
    const event: FileChangeEvent = { kind: "modify", path: "img.png", oldLineCount: 0, newLineCount: 0, binary: true, hunks: [] };

    expect(validateChange(HASH, event)).toEqual(event);
  });

  it("should name the path in the error", () => {
    expect(() =>
      validateChange(HASH, { kind: "delete", path: "gone.txt", oldLineCount: 1, newLineCount: 1, binary: false, hunks: [] }),
    ).toThrow(/^Malformed diff event for gone\.txt in eeeeeeee: /);
  });
});
