/**
 * Record Emitter - flattens ledger records into the external row format
 */

import type { ModificationRecord } from "../ledger/types.js";

export const RECORD_COLUMNS = [
  "commit_hash",
  "author",
  "date",
  "modified_at",
  "modification_type",
  "file_path",
  "start_line",
  "end_line",
  "line_count",
] as const;

export type RecordColumn = (typeof RECORD_COLUMNS)[number];

export interface RecordRow {
  commit_hash: string;
  author: string;
  date: string;
  /** Date of the first later commit that touched these lines, "" when none did */
  modified_at: string;
  modification_type: ModificationRecord["type"];
  /** Paths joined with ";" (old and new path for a rename) */
  file_path: string;
  start_line: number;
  end_line: number;
  line_count: number;
}

export function toRecordRow(record: ModificationRecord): RecordRow {
  return {
    commit_hash: record.commit.hash,
    author: record.commit.author,
    date: record.commit.date,
    modified_at: record.modifiedBy?.date ?? "",
    modification_type: record.type,
    file_path: record.filePaths.join(";"),
    start_line: record.startLine,
    end_line: record.endLine,
    line_count: record.lineCount,
  };
}

/**
 * Rows in commit-then-discovery order
 */
export function toRecordRows(records: readonly ModificationRecord[]): RecordRow[] {
  return [...records]
    .sort((a, b) => a.commit.sequenceIndex - b.commit.sequenceIndex || a.id - b.id)
    .map(toRecordRow);
}
