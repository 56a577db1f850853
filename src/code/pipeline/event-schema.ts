/**
 * Structural validation of file change events
 *
 * Events can come from any CommitDiff source, so every event is checked
 * before it reaches the ledger. A failure becomes a MalformedDiffEventError.
 */

import { z } from "zod";

import { MalformedDiffEventError } from "../errors.js";
import type { FileChangeEvent, Hunk } from "../git/types.js";

const LineCount = z.number().int().nonnegative();

const HunkSchema = z.object({
  oldStart: LineCount,
  oldCount: LineCount,
  newStart: LineCount,
  newCount: LineCount,
  lines: z.array(z.string()),
});

const ContentSchema = {
  oldLineCount: LineCount,
  newLineCount: LineCount,
  binary: z.boolean(),
  hunks: z.array(HunkSchema),
};

const FileChangeEventSchema = z
  .discriminatedUnion("kind", [
    z.object({
      kind: z.enum(["add", "modify", "delete"]),
      path: z.string().min(1),
      ...ContentSchema,
    }),
    z.object({
      kind: z.literal("rename"),
      oldPath: z.string().min(1),
      newPath: z.string().min(1),
      similarity: z.number().min(0).max(100),
      ...ContentSchema,
    }),
  ])
  .superRefine((event, ctx) => {
    const issue = (message: string, path: Array<string | number> = []) =>
      ctx.addIssue({ code: z.ZodIssueCode.custom, message, path });

    if (event.kind === "add" && event.oldLineCount !== 0) {
      issue("added file must have no parent lines", ["oldLineCount"]);
    }
    if (event.kind === "delete" && event.newLineCount !== 0) {
      issue("deleted file must have no remaining lines", ["newLineCount"]);
    }
    if (event.kind === "rename" && event.oldPath === event.newPath) {
      issue("rename must change the path", ["newPath"]);
    }
    if (event.binary) return;

    let delta = 0;
    let previous: Hunk | null = null;
    for (const [i, hunk] of event.hunks.entries()) {
      for (const problem of hunkProblems(hunk)) {
        issue(problem, ["hunks", i]);
      }
      if (previous && hunk.oldStart < previous.oldStart + previous.oldCount) {
        issue("hunks must be ascending and non-overlapping", ["hunks", i]);
      }
      if (hunk.oldStart + hunk.oldCount - 1 > event.oldLineCount) {
        issue(`hunk reaches past the parent's ${event.oldLineCount} lines`, ["hunks", i]);
      }
      delta += hunk.newCount - hunk.oldCount;
      previous = hunk;
    }

    if (event.oldLineCount + delta !== event.newLineCount) {
      issue(
        `hunks turn ${event.oldLineCount} lines into ${event.oldLineCount + delta}, expected ${event.newLineCount}`,
        ["hunks"],
      );
    }
  });

function hunkProblems(hunk: Hunk): string[] {
  const problems: string[] = [];

  if (hunk.oldCount === 0 && hunk.newCount === 0) {
    problems.push("hunk changes no lines");
  }
  if (hunk.oldCount > 0 && hunk.oldStart < 1) {
    problems.push("oldStart must be at least 1 when lines are removed");
  }
  if (hunk.newCount > 0 && hunk.newStart < 1) {
    problems.push("newStart must be at least 1 when lines are added");
  }

  let removed = 0;
  let added = 0;
  let context = 0;
  for (const line of hunk.lines) {
    if (line.startsWith("-")) removed++;
    else if (line.startsWith("+")) added++;
    else if (!line.startsWith("\\")) context++;
  }
  if (context > 0) {
    problems.push(`${context} context line(s) in a zero-context hunk`);
  }
  if (removed !== hunk.oldCount) {
    problems.push(`${removed} removed line(s), header says ${hunk.oldCount}`);
  }
  if (added !== hunk.newCount) {
    problems.push(`${added} added line(s), header says ${hunk.newCount}`);
  }

  return problems;
}

export function eventPath(event: FileChangeEvent): string {
  return event.kind === "rename" ? event.newPath : event.path;
}

/**
 * @throws MalformedDiffEventError when the event is structurally invalid
 */
export function validateChange(commitHash: string, event: FileChangeEvent): FileChangeEvent {
  const parsed = FileChangeEventSchema.safeParse(event);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message));
    throw new MalformedDiffEventError(commitHash, eventPath(event) || "(unknown)", issues);
  }
  return parsed.data;
}
