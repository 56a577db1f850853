/**
 * Per-commit aggregates: line counts per modification type and the set of
 * affected files. Shaped like the `commits` table rows of the analysis schema.
 */

import type { Commit } from "../git/types.js";
import type { ModificationRecord } from "../ledger/types.js";

export const SUMMARY_COLUMNS = [
  "commit_hash",
  "date",
  "message",
  "affected_files",
  "additions",
  "deletions",
  "modifications",
] as const;

export interface CommitSummaryRow {
  commit_hash: string;
  date: string;
  message: string;
  /** Sorted, ";"-joined */
  affected_files: string;
  additions: number;
  deletions: number;
  modifications: number;
}

export function summarizeCommits(
  commits: readonly Commit[],
  records: readonly ModificationRecord[],
): CommitSummaryRow[] {
  const byCommit = new Map<string, ModificationRecord[]>();
  for (const record of records) {
    const list = byCommit.get(record.commit.hash);
    if (list) {
      list.push(record);
    } else {
      byCommit.set(record.commit.hash, [record]);
    }
  }

  return [...commits]
    .sort((a, b) => a.sequenceIndex - b.sequenceIndex)
    .map((commit) => {
      const files = new Set<string>();
      let additions = 0;
      let deletions = 0;
      let modifications = 0;

      for (const record of byCommit.get(commit.hash) ?? []) {
        for (const path of record.filePaths) files.add(path);
        switch (record.type) {
          case "ADDITION":
            additions += record.lineCount;
            break;
          case "DELETION":
            deletions += record.lineCount;
            break;
          case "MODIFICATION":
            modifications += record.lineCount;
            break;
        }
      }

      return {
        commit_hash: commit.hash,
        date: commit.date,
        message: commit.message,
        affected_files: [...files].sort().join(";"),
        additions,
        deletions,
        modifications,
      };
    });
}
