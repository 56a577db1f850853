/**
 * ProvenanceLedger - stateful, order-sensitive core of the history analysis
 *
 * ALGORITHM:
 * 1. Each tracked path owns an OwnershipTable (current line → record)
 * 2. Hunks of one file diff arrive in ascending order; a running offset maps
 *    parent-version coordinates onto the partially updated table
 * 3. Removed lines back-fill their owners (first later commit wins)
 * 4. Added lines are installed as a segment owned by the new record
 *
 * CONSTRAINTS:
 * - Validation precedes mutation: a rejected hunk leaves the table untouched
 * - "Later" means a greater sequenceIndex, never a later wall-clock date
 */

import { ReconciliationError } from "../errors.js";
import type { Commit } from "../git/types.js";
import { OwnershipTable } from "./ownership-table.js";
import type {
  ClassifiedHunk,
  LocatedRange,
  ModificationRecord,
  OwnershipEntry,
} from "./types.js";

interface DiffCursor {
  commitHash: string;
  path: string;
  offset: number;
}

export class ProvenanceLedger {
  private readonly tables = new Map<string, OwnershipTable>();
  /** Paths whose tracking was given up after a ReconciliationError */
  private readonly dropped = new Set<string>();
  private readonly emitted: ModificationRecord[] = [];
  private cursor: DiffCursor | null = null;
  private nextId = 1;

  /**
   * Seed a table for a path the ledger has not seen yet. Pre-existing lines
   * get a baseline owner. For a tracked path the length must agree.
   */
  track(path: string, lineCount: number): void {
    if (this.dropped.has(path)) return;

    const table = this.tables.get(path);
    if (!table) {
      this.tables.set(path, new OwnershipTable(lineCount));
      return;
    }
    if (table.length !== lineCount) {
      throw new ReconciliationError(
        path,
        1,
        Math.max(lineCount, 1),
        table.length,
        `parent version has ${lineCount} lines`,
      );
    }
  }

  /**
   * Apply one classified hunk of `commit` to the last path in `filePaths`.
   *
   * @returns the record emitted for the hunk
   */
  apply(commit: Commit, filePaths: readonly string[], hunk: ClassifiedHunk): ModificationRecord {
    const path = filePaths[filePaths.length - 1];
    if (path === undefined) {
      throw new TypeError("apply() needs at least one file path");
    }

    const offset = this.offsetFor(commit, path);

    if (this.dropped.has(path)) {
      this.advance(hunk);
      return this.emit(commit, filePaths, hunk);
    }

    const table = this.tables.get(path);
    const removeStart = hunk.oldStart + offset;
    const removeEnd = removeStart + hunk.oldCount - 1;

    if (!table) {
      throw new ReconciliationError(path, hunk.startLine, hunk.endLine, null, "no ownership table");
    }
    if (hunk.oldCount > 0 && (removeStart < 1 || removeEnd > table.length)) {
      throw new ReconciliationError(path, removeStart, removeEnd, table.length);
    }
    if (hunk.newCount > 0) {
      const lengthBeforeInsert = table.length - hunk.oldCount;
      if (hunk.newStart < 1 || hunk.newStart > lengthBeforeInsert + 1) {
        throw new ReconciliationError(path, hunk.startLine, hunk.endLine, table.length);
      }
      if (hunk.oldCount > 0 && hunk.newStart !== removeStart) {
        throw new ReconciliationError(
          path,
          hunk.startLine,
          hunk.endLine,
          table.length,
          `replacement starts at ${hunk.newStart}, removed range maps to ${removeStart}`,
        );
      }
    }

    const record = this.emit(commit, filePaths, hunk);

    if (hunk.oldCount > 0) {
      for (const owner of table.remove(removeStart, removeEnd)) {
        this.backfill(owner, commit);
      }
    }
    if (hunk.newCount > 0) {
      table.insert(hunk.newStart, hunk.newCount, record);
    }

    this.advance(hunk);
    return record;
  }

  /**
   * Re-key a path's table; ranges and owners stay as they are
   */
  rename(oldPath: string, newPath: string): void {
    if (this.dropped.delete(oldPath)) {
      this.tables.delete(newPath);
      this.dropped.add(newPath);
      return;
    }

    const table = this.tables.get(oldPath);
    if (!table) return;
    this.tables.delete(oldPath);
    this.dropped.delete(newPath);
    this.tables.set(newPath, table);
  }

  /**
   * Stop tracking a path that no longer exists (deleted, or now binary)
   */
  forget(path: string): void {
    this.tables.delete(path);
    this.dropped.delete(path);
  }

  /**
   * Give up provenance for a path for the rest of the run. Later hunks for
   * it still emit records, without ownership or back-fill.
   */
  drop(path: string): void {
    this.tables.delete(path);
    this.dropped.add(path);
  }

  isTracked(path: string): boolean {
    return this.tables.has(path);
  }

  isDropped(path: string): boolean {
    return this.dropped.has(path);
  }

  /**
   * Current line count of a tracked path
   */
  lengthOf(path: string): number | undefined {
    return this.tables.get(path)?.length;
  }

  /**
   * Ownership snapshot of a tracked path (empty when untracked)
   */
  ownership(path: string): OwnershipEntry[] {
    return this.tables.get(path)?.entries() ?? [];
  }

  /**
   * Where a record's lines currently live, after every shift so far
   */
  locate(record: ModificationRecord): LocatedRange[] {
    const located: LocatedRange[] = [];
    for (const [filePath, table] of this.tables) {
      for (const range of table.rangesOf(record)) {
        located.push({ filePath, ...range });
      }
    }
    return located;
  }

  /**
   * All records in discovery order
   */
  records(): readonly ModificationRecord[] {
    return this.emitted;
  }

  private offsetFor(commit: Commit, path: string): number {
    if (!this.cursor || this.cursor.commitHash !== commit.hash || this.cursor.path !== path) {
      this.cursor = { commitHash: commit.hash, path, offset: 0 };
    }
    return this.cursor.offset;
  }

  private advance(hunk: ClassifiedHunk): void {
    if (this.cursor) {
      this.cursor.offset += hunk.newCount - hunk.oldCount;
    }
  }

  private emit(commit: Commit, filePaths: readonly string[], hunk: ClassifiedHunk): ModificationRecord {
    const record: ModificationRecord = {
      id: this.nextId++,
      type: hunk.type,
      commit,
      filePaths: [...filePaths],
      startLine: hunk.startLine,
      endLine: hunk.endLine,
      lineCount: hunk.lineCount,
      modifiedBy: null,
    };
    this.emitted.push(record);
    return record;
  }

  /**
   * Set modifiedBy once, and only from a strictly later commit
   */
  private backfill(record: ModificationRecord, commit: Commit): void {
    if (record.modifiedBy === null && commit.sequenceIndex > record.commit.sequenceIndex) {
      record.modifiedBy = commit;
    }
  }
}
