/**
 * Git History Module
 *
 * Diff event source for the provenance ledger:
 * - First-parent history via isomorphic-git (0 process spawns)
 * - Zero-context hunks via structuredPatch
 * - git-style rename pairing with a similarity score
 */

export {
  GitLogReader,
  computeHunks,
  countLines,
  formatCommitDate,
  isBinary,
  similarityIndex,
} from "./git-log-reader.js";
export type {
  Commit,
  CommitDiff,
  FileChangeEvent,
  FileChangeKind,
  FileDiff,
  GitRepoInfo,
  HistoryReadOptions,
  Hunk,
  RenameSignal,
} from "./types.js";
