/**
 * Error taxonomy for history analysis
 *
 * - SourceUnavailableError: fatal, raised before any record exists
 * - MalformedDiffEventError: per file change, logged and skipped
 * - ReconciliationError: ownership table diverged from the reported diff
 */

export class SourceUnavailableError extends Error {
  readonly repoPath: string;

  constructor(repoPath: string, reason: string) {
    super(`Repository unavailable at ${repoPath}: ${reason}`);
    this.name = "SourceUnavailableError";
    this.repoPath = repoPath;
  }
}

export class MalformedDiffEventError extends Error {
  readonly commitHash: string;
  readonly path: string;
  readonly issues: string[];

  constructor(commitHash: string, path: string, issues: string[]) {
    super(`Malformed diff event for ${path} in ${commitHash.slice(0, 8)}: ${issues.join("; ")}`);
    this.name = "MalformedDiffEventError";
    this.commitHash = commitHash;
    this.path = path;
    this.issues = issues;
  }
}

export class ReconciliationError extends Error {
  readonly filePath: string;
  readonly startLine: number;
  readonly endLine: number;
  /** Line count the ledger tracks for the file, null when the file is untracked */
  readonly trackedLength: number | null;

  constructor(
    filePath: string,
    startLine: number,
    endLine: number,
    trackedLength: number | null,
    detail?: string,
  ) {
    const tracked = trackedLength === null ? "untracked" : `${trackedLength} tracked lines`;
    super(
      `Ownership diverged for ${filePath} at lines ${startLine}-${endLine} (${tracked})` +
        (detail ? `: ${detail}` : ""),
    );
    this.name = "ReconciliationError";
    this.filePath = filePath;
    this.startLine = startLine;
    this.endLine = endLine;
    this.trackedLength = trackedLength;
  }
}
