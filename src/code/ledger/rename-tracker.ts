/**
 * RenameTracker - keeps file identity across renames and moves
 *
 * At or above the similarity threshold the ledger's table is re-keyed and the
 * rename's own content changes are applied under [oldPath, newPath]. Below it
 * the old path is deleted and the new one added from scratch.
 */

import type { Commit, Hunk, RenameSignal } from "../git/types.js";
import { classifyHunk, wholeFileAddition, wholeFileDeletion } from "./hunk-classifier.js";
import type { ProvenanceLedger } from "./provenance-ledger.js";
import type { ModificationRecord } from "./types.js";

export type RenameOutcome =
  | { continuous: true; filePaths: [string, string]; hunks: Hunk[] }
  | { continuous: false; records: ModificationRecord[] };

/** git's default rename threshold (-M50%) */
export const DEFAULT_RENAME_THRESHOLD = 50;

export class RenameTracker {
  constructor(
    private readonly ledger: ProvenanceLedger,
    private readonly threshold: number = DEFAULT_RENAME_THRESHOLD,
  ) {
    if (threshold < 0 || threshold > 100) {
      throw new RangeError(`Rename threshold must be within 0-100, got ${threshold}`);
    }
  }

  /**
   * Whether a signal keeps identity continuity
   */
  isContinuous(signal: RenameSignal): boolean {
    return signal.similarity >= this.threshold;
  }

  /**
   * Handle the identity part of one rename signal of `commit`.
   *
   * A continuous rename re-keys the ledger and hands the signal's hunks back
   * to the caller, to be applied under the returned paths. Otherwise the old
   * path is deleted and the new path added, and those records are returned.
   */
  handle(commit: Commit, signal: RenameSignal): RenameOutcome {
    const { oldPath, newPath } = signal;

    if (signal.binary) {
      this.ledger.forget(oldPath);
      this.ledger.forget(newPath);
      return { continuous: false, records: [] };
    }

    if (this.isContinuous(signal)) {
      this.ledger.track(oldPath, signal.oldLineCount);
      this.ledger.rename(oldPath, newPath);
      return { continuous: true, filePaths: [oldPath, newPath], hunks: signal.hunks };
    }

    const records: ModificationRecord[] = [];

    if (signal.oldLineCount > 0) {
      this.ledger.track(oldPath, signal.oldLineCount);
      const deletion = classifyHunk(wholeFileDeletion(signal.oldLineCount));
      if (deletion) {
        records.push(this.ledger.apply(commit, [oldPath], deletion));
      }
    }
    this.ledger.forget(oldPath);

    this.ledger.forget(newPath);
    this.ledger.track(newPath, 0);
    if (signal.newLineCount > 0) {
      const addition = classifyHunk(wholeFileAddition(signal.newLineCount));
      if (addition) {
        records.push(this.ledger.apply(commit, [newPath], addition));
      }
    }

    return { continuous: false, records };
  }
}
