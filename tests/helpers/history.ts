/**
 * Shared builders for history tests
 */

import type { Commit, CommitDiff, FileChangeEvent, Hunk } from "../../src/code/git/types.js";
import type { ModificationRecord } from "../../src/code/ledger/types.js";

/**
 * Commit with a deterministic hash and date derived from its sequence index
 */
export function makeCommit(sequenceIndex: number, overrides: Partial<Commit> = {}): Commit {
  const day = String(sequenceIndex + 1).padStart(2, "0");
  return {
    hash: `c${sequenceIndex}`.padEnd(40, "0"),
    author: "dev@example.com",
    authorName: "Dev",
    date: `2024-01-${day}T10:00:00+00:00`,
    message: `commit ${sequenceIndex}`,
    sequenceIndex,
    ...overrides,
  };
}

/**
 * Zero-context hunk with placeholder removed/added lines
 */
export function hunk(oldStart: number, oldCount: number, newStart: number, newCount: number): Hunk {
  const lines: string[] = [];
  for (let i = 0; i < oldCount; i++) lines.push(`-old ${oldStart + i}`);
  for (let i = 0; i < newCount; i++) lines.push(`+new ${newStart + i}`);
  return { oldStart, oldCount, newStart, newCount, lines };
}

export function commitDiff(commit: Commit, changes: FileChangeEvent[]): CommitDiff {
  return { commit, changes };
}

export function makeRecord(id: number, commit: Commit, path = "f.txt"): ModificationRecord {
  return {
    id,
    type: "ADDITION",
    commit,
    filePaths: [path],
    startLine: 1,
    endLine: 1,
    lineCount: 1,
    modifiedBy: null,
  };
}
