/**
 * Git History Types
 *
 * Design principles:
 * - Commits are read oldest-first along the first-parent chain
 * - Every file change carries zero-context hunks (no context lines)
 * - Rename signals carry their similarity; the threshold decision is made downstream
 * - 0 process spawns, direct .git reading via isomorphic-git
 */

/**
 * Commit info extracted from git log (used by GitLogReader)
 */
export interface Commit {
  hash: string;
  /** Author e-mail, or the author name when the e-mail is empty */
  author: string;
  authorName: string;
  /** ISO-8601 with the author's UTC offset, e.g. 2024-01-15T10:30:45+02:00 */
  date: string;
  /** Subject line of the commit message */
  message: string;
  /** Position in processing order; defines "earlier" and "later" */
  sequenceIndex: number;
}

/**
 * A single contiguous zero-context block of a unified diff.
 *
 * When a count is zero, its start names the position of the change in that
 * version (structuredPatch convention).
 */
export interface Hunk {
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
  /** Removed lines prefixed with "-", added lines with "+" */
  lines: string[];
}

export type FileChangeKind = "add" | "modify" | "delete";

/**
 * Content change of one path in one commit
 */
export interface FileDiff {
  kind: FileChangeKind;
  path: string;
  /** Line count of the parent version (0 for added files) */
  oldLineCount: number;
  /** Line count of the commit's version (0 for deleted files) */
  newLineCount: number;
  binary: boolean;
  hunks: Hunk[];
}

/**
 * Rename/move reported for an added path paired with a deleted one
 */
export interface RenameSignal {
  kind: "rename";
  oldPath: string;
  newPath: string;
  /** 0-100, 100 for identical content */
  similarity: number;
  oldLineCount: number;
  newLineCount: number;
  binary: boolean;
  /** Content changes between the old and the new version */
  hunks: Hunk[];
}

export type FileChangeEvent = FileDiff | RenameSignal;

/**
 * All file-level changes of one commit versus its primary parent
 */
export interface CommitDiff {
  commit: Commit;
  changes: FileChangeEvent[];
}

/**
 * Options for reading the history window
 */
export interface HistoryReadOptions {
  /** Newest commits to skip before the window starts */
  skip?: number;
  /** Maximum number of commits in the window (default: all) */
  maxCommits?: number;
}

/**
 * Git repository information
 */
export interface GitRepoInfo {
  repoRoot: string;
  headSha: string | null;
}
