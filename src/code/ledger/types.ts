/**
 * Type definitions for the line provenance ledger
 */

import type { Commit } from "../git/types.js";

export type ModificationType = "ADDITION" | "DELETION" | "MODIFICATION";

/**
 * Output of the hunk classifier. The owning commit is attached by the ledger.
 */
export interface ClassifiedHunk {
  type: ModificationType;
  startLine: number;
  endLine: number;
  lineCount: number;
  /** Raw coordinates, needed to resolve the hunk against the ownership table */
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
}

interface RecordFields {
  /** Discovery order within the run, starting at 1 */
  readonly id: number;
  readonly commit: Commit;
  /** One path, or [oldPath, newPath] when the hunk belongs to a rename */
  readonly filePaths: readonly string[];
  readonly startLine: number;
  readonly endLine: number;
  readonly lineCount: number;
  /**
   * First later commit that deleted or rewrote any of these lines.
   * Only mutable cell; set at most once.
   */
  modifiedBy: Commit | null;
}

export interface AdditionRecord extends RecordFields {
  readonly type: "ADDITION";
}

export interface DeletionRecord extends RecordFields {
  readonly type: "DELETION";
}

export interface ChangeRecord extends RecordFields {
  readonly type: "MODIFICATION";
}

export type ModificationRecord = AdditionRecord | DeletionRecord | ChangeRecord;

/**
 * A contiguous run of current lines owned by one record.
 * owner === null marks baseline lines that predate the processed window.
 */
export interface OwnershipEntry {
  start: number;
  end: number;
  owner: ModificationRecord | null;
}

/**
 * Where a record's lines currently live
 */
export interface LocatedRange {
  filePath: string;
  start: number;
  end: number;
}
