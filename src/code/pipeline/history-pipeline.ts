/**
 * HistoryPipeline - source → classifier → rename tracker → ledger → emitter
 *
 * Commits are consumed in order, one at a time. Per-change failures are
 * isolated: a malformed event is skipped, a ReconciliationError drops
 * ownership tracking for that file (or aborts the run in strict mode).
 */

import { RECORD_COLUMNS, SUMMARY_COLUMNS, summarizeCommits, toRecordRows, writeCsv } from "../emitter/index.js";
import { MalformedDiffEventError, ReconciliationError } from "../errors.js";
import { createPathFilter } from "../filters/index.js";
import { GitLogReader } from "../git/index.js";
import type { Commit, CommitDiff, FileChangeEvent, FileDiff, Hunk, RenameSignal } from "../git/index.js";
import { classifyHunk, DEFAULT_RENAME_THRESHOLD, ProvenanceLedger, RenameTracker } from "../ledger/index.js";
import { pipelineLog } from "./debug-logger.js";
import { validateChange } from "./event-schema.js";
import type {
  AnalysisResult,
  AnalyzeRepositoryOptions,
  HistoryPipelineOptions,
  PipelineStats,
  SkippedItem,
} from "./types.js";

const LOG_CTX = { component: "HistoryPipeline" };

/**
 * Mutable state of a single run
 */
interface RunState {
  ledger: ProvenanceLedger;
  tracker: RenameTracker;
  skipped: SkippedItem[];
  stats: PipelineStats;
}

function emptyStats(): PipelineStats {
  return {
    commitsProcessed: 0,
    changesProcessed: 0,
    recordsEmitted: 0,
    additions: 0,
    deletions: 0,
    modifications: 0,
    backfilledRecords: 0,
    renamesFollowed: 0,
    renamesSplit: 0,
    binaryChanges: 0,
    filteredChanges: 0,
    malformedEvents: 0,
    degradedFiles: 0,
  };
}

export class HistoryPipeline {
  private readonly renameThreshold: number;
  private readonly strict: boolean;
  private readonly accepts: (path: string) => boolean;

  constructor(private readonly options: HistoryPipelineOptions = {}) {
    this.renameThreshold = options.renameThreshold ?? DEFAULT_RENAME_THRESHOLD;
    this.strict = options.strict ?? false;
    this.accepts = createPathFilter(options.pathPattern);
    if (this.renameThreshold < 0 || this.renameThreshold > 100) {
      throw new RangeError(`Rename threshold must be within 0-100, got ${this.renameThreshold}`);
    }
  }

  /**
   * Analyze a stream of commit diffs, oldest first.
   *
   * Each call starts from an empty ledger, so the same input always yields
   * the same records.
   */
  async run(source: AsyncIterable<CommitDiff> | Iterable<CommitDiff>): Promise<AnalysisResult> {
    const startTime = Date.now();
    const ledger = new ProvenanceLedger();
    const state: RunState = {
      ledger,
      tracker: new RenameTracker(ledger, this.renameThreshold),
      skipped: [],
      stats: emptyStats(),
    };
    const commits: Commit[] = [];
    let lastSequence = Number.NEGATIVE_INFINITY;

    pipelineLog.resetProfiler();
    pipelineLog.step(LOG_CTX, "RUN_START", {
      renameThreshold: this.renameThreshold,
      strict: this.strict,
      pathPattern: this.options.pathPattern ?? null,
      maxCommits: this.options.maxCommits ?? null,
    });

    const limit = this.options.maxCommits;
    const input: AsyncIterable<CommitDiff> | Iterable<CommitDiff> = limit === 0 ? [] : source;

    let readStart = Date.now();
    for await (const { commit, changes } of input) {
      pipelineLog.addStageTime("read", Date.now() - readStart);

      if (commit.sequenceIndex <= lastSequence) {
        const message = `sequence index ${commit.sequenceIndex} does not follow ${lastSequence}`;
        state.skipped.push({ commitHash: commit.hash, path: "", reason: "out_of_order", message });
        pipelineLog.skipped(LOG_CTX, "out_of_order", "", message);
        console.error(`[HistoryPipeline] Skipping commit ${commit.hash.slice(0, 8)}: ${message}`);
        readStart = Date.now();
        continue;
      }
      lastSequence = commit.sequenceIndex;
      commits.push(commit);

      let commitRecords = 0;
      for (const change of changes) {
        commitRecords += this.processChange(state, commit, change);
      }
      state.stats.commitsProcessed++;
      pipelineLog.commitProcessed(LOG_CTX, commit.hash, commit.sequenceIndex, changes.length, commitRecords);

      // Stop before the source computes another commit diff
      if (limit !== undefined && commits.length >= limit) break;

      readStart = Date.now();
    }

    pipelineLog.stageStart("emit");
    const records = ledger.records();
    const rows = toRecordRows(records);
    const summaries = summarizeCommits(commits, records);
    pipelineLog.stageEnd("emit");

    const { stats, skipped } = state;
    stats.recordsEmitted = records.length;
    for (const record of records) {
      if (record.type === "ADDITION") stats.additions++;
      else if (record.type === "DELETION") stats.deletions++;
      else stats.modifications++;
      if (record.modifiedBy) stats.backfilledRecords++;
    }

    const durationMs = Date.now() - startTime;
    pipelineLog.summary(LOG_CTX, { ...stats, skipped: skipped.length, durationMs });

    return {
      status: skipped.length > 0 ? "partial" : "completed",
      commits,
      records,
      rows,
      summaries,
      skipped,
      stats,
      durationMs,
      ledger,
    };
  }

  /**
   * @returns number of records emitted for the change
   */
  private processChange(state: RunState, commit: Commit, change: FileChangeEvent): number {
    state.stats.changesProcessed++;

    let event: FileChangeEvent;
    pipelineLog.stageStart("classify");
    try {
      event = validateChange(commit.hash, change);
    } catch (error) {
      if (!(error instanceof MalformedDiffEventError)) throw error;
      state.stats.malformedEvents++;
      state.skipped.push({ commitHash: commit.hash, path: error.path, reason: "malformed", message: error.message });
      pipelineLog.skipped(LOG_CTX, "malformed", error.path, error.issues.join("; "));
      console.error(`[HistoryPipeline] ${error.message}`);
      return 0;
    } finally {
      pipelineLog.stageEnd("classify");
    }

    if (!this.isSelected(event)) {
      state.stats.filteredChanges++;
      return 0;
    }

    pipelineLog.stageStart("ledger");
    try {
      return event.kind === "rename"
        ? this.processRename(state, commit, event)
        : this.processFileDiff(state, commit, event);
    } finally {
      pipelineLog.stageEnd("ledger");
    }
  }

  private isSelected(event: FileChangeEvent): boolean {
    return event.kind === "rename"
      ? this.accepts(event.oldPath) || this.accepts(event.newPath)
      : this.accepts(event.path);
  }

  private processFileDiff(state: RunState, commit: Commit, event: FileDiff): number {
    const { ledger } = state;

    if (event.binary) {
      ledger.forget(event.path);
      state.stats.binaryChanges++;
      return 0;
    }

    this.reconcile(state, commit, () => ledger.track(event.path, event.oldLineCount));
    const emitted = this.applyHunks(state, commit, [event.path], event.hunks);

    if (event.kind === "delete") {
      ledger.forget(event.path);
    }
    return emitted;
  }

  private processRename(state: RunState, commit: Commit, event: RenameSignal): number {
    if (event.binary) {
      state.stats.binaryChanges++;
    }

    const outcome = this.reconcile(state, commit, () => state.tracker.handle(commit, event));
    if (!outcome.continuous) {
      if (!event.binary) state.stats.renamesSplit++;
      return outcome.records.length;
    }

    state.stats.renamesFollowed++;
    return this.applyHunks(state, commit, outcome.filePaths, outcome.hunks);
  }

  private applyHunks(state: RunState, commit: Commit, filePaths: string[], hunks: Hunk[]): number {
    let emitted = 0;
    for (const hunk of hunks) {
      const classified = classifyHunk(hunk);
      if (!classified) continue;
      this.reconcile(state, commit, () => state.ledger.apply(commit, filePaths, classified));
      emitted++;
    }
    return emitted;
  }

  /**
   * Run a ledger action; on ReconciliationError give up tracking the file
   * and run the action again untracked. Strict mode rethrows.
   */
  private reconcile<T>(state: RunState, commit: Commit, action: () => T): T {
    try {
      return action();
    } catch (error) {
      if (!(error instanceof ReconciliationError) || this.strict) throw error;

      state.ledger.drop(error.filePath);
      state.stats.degradedFiles++;
      state.skipped.push({
        commitHash: commit.hash,
        path: error.filePath,
        reason: "reconciliation",
        message: error.message,
      });
      pipelineLog.fileDegraded(LOG_CTX, error.filePath, error.message);
      console.error(`[HistoryPipeline] Dropping ownership tracking: ${error.message}`);
      return action();
    }
  }
}

/**
 * Read a repository's first-parent history and analyze it
 *
 * @throws SourceUnavailableError when the path is not a readable repository
 */
export async function analyzeRepository(
  repoPath: string,
  options: AnalyzeRepositoryOptions = {},
  reader: GitLogReader = new GitLogReader(),
): Promise<AnalysisResult> {
  const pipeline = new HistoryPipeline(options);
  return pipeline.run(reader.readHistory(repoPath, { skip: options.skip, maxCommits: options.maxCommits }));
}

export interface OutputTargets {
  outputPath?: string;
  summaryOutputPath?: string;
  append?: boolean;
}

export interface WrittenOutputs {
  records?: { path: string; rowsWritten: number };
  summaries?: { path: string; rowsWritten: number };
}

/**
 * Write record rows and commit summaries as CSV
 */
export async function writeAnalysisOutputs(result: AnalysisResult, targets: OutputTargets): Promise<WrittenOutputs> {
  const written: WrittenOutputs = {};
  const append = targets.append ?? false;

  if (targets.outputPath) {
    const { path, rowsWritten } = await writeCsv(targets.outputPath, RECORD_COLUMNS, result.rows, { append });
    written.records = { path, rowsWritten };
  }
  if (targets.summaryOutputPath) {
    const { path, rowsWritten } = await writeCsv(targets.summaryOutputPath, SUMMARY_COLUMNS, result.summaries, {
      append,
    });
    written.summaries = { path, rowsWritten };
  }

  pipelineLog.step(LOG_CTX, "OUTPUTS_WRITTEN", { ...written });
  return written;
}
