/**
 * Hunk classification
 *
 * One hunk yields at most one classified range. Interleaved removed/added
 * lines are not paired: hunk granularity is the unit of classification.
 */

import type { Hunk } from "../git/types.js";
import type { ClassifiedHunk, ModificationType } from "./types.js";

/**
 * Classify a zero-context hunk as ADDITION, DELETION or MODIFICATION.
 *
 * - oldCount == 0 → ADDITION over new-version lines
 * - newCount == 0 → DELETION over parent-version lines
 * - both > 0     → MODIFICATION over new-version lines
 *
 * Returns null for a hunk without any line delta.
 */
export function classifyHunk(hunk: Hunk): ClassifiedHunk | null {
  const { oldStart, oldCount, newStart, newCount } = hunk;

  let type: ModificationType;
  let startLine: number;
  let lineCount: number;

  if (oldCount === 0 && newCount === 0) {
    return null;
  } else if (oldCount === 0) {
    type = "ADDITION";
    startLine = newStart;
    lineCount = newCount;
  } else if (newCount === 0) {
    type = "DELETION";
    startLine = oldStart;
    lineCount = oldCount;
  } else {
    type = "MODIFICATION";
    startLine = newStart;
    lineCount = newCount;
  }

  return {
    type,
    startLine,
    endLine: startLine + lineCount - 1,
    lineCount,
    oldStart,
    oldCount,
    newStart,
    newCount,
  };
}

/**
 * Hunk covering every line of a file, as a pure deletion (whole-file removal)
 */
export function wholeFileDeletion(lineCount: number): Hunk {
  return { oldStart: 1, oldCount: lineCount, newStart: 0, newCount: 0, lines: [] };
}

/**
 * Hunk covering every line of a file, as a pure addition (whole-file creation)
 */
export function wholeFileAddition(lineCount: number): Hunk {
  return { oldStart: 0, oldCount: 0, newStart: 1, newCount: lineCount, lines: [] };
}
