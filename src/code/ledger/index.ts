/**
 * Line Provenance Module
 *
 * Classifies hunks, tracks which record owns every current line of every
 * file, and back-fills records whose lines later commits touch again.
 */

export { classifyHunk, wholeFileAddition, wholeFileDeletion } from "./hunk-classifier.js";
export { OwnershipTable } from "./ownership-table.js";
export { ProvenanceLedger } from "./provenance-ledger.js";
export { DEFAULT_RENAME_THRESHOLD, RenameTracker } from "./rename-tracker.js";
export type { RenameOutcome } from "./rename-tracker.js";
export type {
  AdditionRecord,
  ChangeRecord,
  ClassifiedHunk,
  DeletionRecord,
  LocatedRange,
  ModificationRecord,
  ModificationType,
  OwnershipEntry,
} from "./types.js";
