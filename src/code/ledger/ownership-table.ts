/**
 * OwnershipTable - ordered line-range → record map for one file
 *
 * Segments are contiguous, sorted, non-overlapping and cover lines
 * 1..length exactly once. Adjacent segments with the same owner are merged.
 */

import type { ModificationRecord, OwnershipEntry } from "./types.js";

export class OwnershipTable {
  private segments: OwnershipEntry[] = [];

  constructor(baselineLength = 0) {
    if (baselineLength > 0) {
      this.segments.push({ start: 1, end: baselineLength, owner: null });
    }
  }

  /**
   * Number of lines currently tracked
   */
  get length(): number {
    const last = this.segments[this.segments.length - 1];
    return last ? last.end : 0;
  }

  /**
   * Snapshot of all segments in line order
   */
  entries(): OwnershipEntry[] {
    return this.segments.map((s) => ({ ...s }));
  }

  /**
   * Owner of a single line; undefined when the line is not tracked
   */
  ownerAt(line: number): ModificationRecord | null | undefined {
    const idx = this.indexOf(line);
    return idx < this.segments.length ? this.segments[idx].owner : undefined;
  }

  /**
   * Current ranges owned by a record
   */
  rangesOf(record: ModificationRecord): Array<{ start: number; end: number }> {
    return this.segments
      .filter((s) => s.owner === record)
      .map((s) => ({ start: s.start, end: s.end }));
  }

  /**
   * Insert `count` lines owned by `owner` before line `at`.
   * Lines at or after `at` move down by `count`.
   */
  insert(at: number, count: number, owner: ModificationRecord | null): void {
    if (count < 1 || at < 1 || at > this.length + 1) {
      throw new RangeError(`Cannot insert ${count} lines at ${at} (length ${this.length})`);
    }

    const idx = this.splitAt(at);
    this.shiftFrom(idx, count);
    this.segments.splice(idx, 0, { start: at, end: at + count - 1, owner });
    this.mergeAround(idx);
  }

  /**
   * Remove lines start..end (inclusive). Lines after the range move up.
   *
   * @returns distinct non-baseline owners of the removed lines, in line order
   */
  remove(start: number, end: number): ModificationRecord[] {
    if (start < 1 || end < start || end > this.length) {
      throw new RangeError(`Cannot remove lines ${start}-${end} (length ${this.length})`);
    }

    const first = this.splitAt(start);
    const after = this.splitAt(end + 1);
    const removed = this.segments.splice(first, after - first);

    const owners: ModificationRecord[] = [];
    for (const segment of removed) {
      if (segment.owner && !owners.includes(segment.owner)) {
        owners.push(segment.owner);
      }
    }

    this.shiftFrom(first, -(end - start + 1));
    this.mergeAround(first);
    return owners;
  }

  /**
   * Index of the first segment whose end >= line (segments.length if none)
   */
  private indexOf(line: number): number {
    let left = 0;
    let right = this.segments.length;

    while (left < right) {
      const mid = Math.floor((left + right) / 2);
      if (this.segments[mid].end < line) {
        left = mid + 1;
      } else {
        right = mid;
      }
    }

    return left;
  }

  /**
   * Make sure a segment boundary starts at `line`; returns that segment's index
   */
  private splitAt(line: number): number {
    const idx = this.indexOf(line);
    const segment = this.segments[idx];
    if (segment && segment.start < line) {
      this.segments.splice(idx + 1, 0, { start: line, end: segment.end, owner: segment.owner });
      segment.end = line - 1;
      return idx + 1;
    }
    return idx;
  }

  private shiftFrom(idx: number, delta: number): void {
    for (let i = idx; i < this.segments.length; i++) {
      this.segments[i].start += delta;
      this.segments[i].end += delta;
    }
  }

  /**
   * Merge segment idx with its neighbours when they share an owner
   */
  private mergeAround(idx: number): void {
    const next = this.segments[idx];
    const prev = this.segments[idx - 1];
    if (next && this.segments[idx + 1] && this.segments[idx + 1].owner === next.owner) {
      next.end = this.segments[idx + 1].end;
      this.segments.splice(idx + 1, 1);
    }
    if (prev && next && prev.owner === next.owner) {
      prev.end = next.end;
      this.segments.splice(idx, 1);
    }
  }
}
