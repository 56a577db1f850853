import { describe, expect, it } from "vitest";

import { summarizeCommits } from "../../../src/code/emitter/commit-summary.js";
import type { ModificationRecord } from "../../../src/code/ledger/types.js";
import { makeCommit } from "../../helpers/history.js";

describe("summarizeCommits", () => {
  it("should sum line counts per type and list affected files", () => {
    const commit = makeCommit(1, { message: "refactor parser" });
    const base = { commit, startLine: 1, endLine: 1, modifiedBy: null };
    const records: ModificationRecord[] = [
      { ...base, id: 1, type: "ADDITION", filePaths: ["src/b.ts"], lineCount: 4 },
      { ...base, id: 2, type: "ADDITION", filePaths: ["src/a.ts"], lineCount: 2 },
      { ...base, id: 3, type: "DELETION", filePaths: ["src/b.ts"], lineCount: 3 },
      { ...base, id: 4, type: "MODIFICATION", filePaths: ["old.ts", "src/c.ts"], lineCount: 5 },
    ];

    expect(summarizeCommits([commit], records)).toEqual([
      {
        commit_hash: commit.hash,
        date: commit.date,
        message: "refactor parser",
        affected_files: "old.ts;src/a.ts;src/b.ts;src/c.ts",
        additions: 6,
        deletions: 3,
        modifications: 5,
      },
    ]);
  });

  it("should include commits without records, in sequence order", () => {
    const first = makeCommit(1);
    const second = makeCommit(2);

    const rows = summarizeCommits([second, first], []);

    expect(rows.map((row) => row.commit_hash)).toEqual([first.hash, second.hash]);
    expect(rows[0]).toMatchObject({ affected_files: "", additions: 0, deletions: 0, modifications: 0 });
  });
});
