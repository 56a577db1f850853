/**
 * History Pipeline Types
 */

import type { CommitSummaryRow } from "../emitter/commit-summary.js";
import type { RecordRow } from "../emitter/record-emitter.js";
import type { Commit } from "../git/types.js";
import type { ProvenanceLedger } from "../ledger/provenance-ledger.js";
import type { ModificationRecord } from "../ledger/types.js";

export interface HistoryPipelineOptions {
  /** Minimum similarity (0-100) for a rename to keep identity (default: 50) */
  renameThreshold?: number;
  /** Abort on the first ReconciliationError instead of degrading the file */
  strict?: boolean;
  /** Glob; only matching paths are analyzed (a rename matches through either path) */
  pathPattern?: string;
  /** Stop after this many commits of the input stream */
  maxCommits?: number;
}

export interface AnalyzeRepositoryOptions extends HistoryPipelineOptions {
  /** Newest commits to skip before the window starts */
  skip?: number;
}

export type SkipReason = "malformed" | "reconciliation" | "out_of_order";

/**
 * A file change (or a commit) that was not fully analyzed
 */
export interface SkippedItem {
  commitHash: string;
  /** Empty when the whole commit was skipped */
  path: string;
  reason: SkipReason;
  message: string;
}

export interface PipelineStats {
  commitsProcessed: number;
  changesProcessed: number;
  recordsEmitted: number;
  additions: number;
  deletions: number;
  modifications: number;
  /** Records whose lines were later altered by another commit */
  backfilledRecords: number;
  renamesFollowed: number;
  renamesSplit: number;
  binaryChanges: number;
  filteredChanges: number;
  malformedEvents: number;
  /** Files whose ownership tracking was dropped after a ReconciliationError */
  degradedFiles: number;
}

export type AnalysisStatus = "completed" | "partial";

export interface AnalysisResult {
  /** "partial" when anything was skipped or degraded */
  status: AnalysisStatus;
  commits: Commit[];
  /** Records in discovery order */
  records: readonly ModificationRecord[];
  /** Records as output rows, ordered by (sequence, id) */
  rows: RecordRow[];
  summaries: CommitSummaryRow[];
  skipped: SkippedItem[];
  stats: PipelineStats;
  durationMs: number;
  /** Final ledger state, for ownership queries */
  ledger: ProvenanceLedger;
}
