/**
 * GitLogReader: reads git history via isomorphic-git (0 process spawns).
 *
 * Yields one CommitDiff per commit of the first-parent chain, oldest first.
 * Each commit is diffed against its first parent (or the empty tree for the
 * root commit); hunks come from structuredPatch with zero context lines.
 */

import git from "isomorphic-git";
import type { ReadCommitResult, WalkerEntry } from "isomorphic-git";
import * as fs from "node:fs";
import { resolve } from "node:path";
import { diffLines, structuredPatch } from "diff";
import { SourceUnavailableError } from "../errors.js";
import type {
  Commit,
  CommitDiff,
  FileChangeEvent,
  GitRepoInfo,
  HistoryReadOptions,
  Hunk,
} from "./types.js";

/** git looks at the first 8000 bytes when deciding whether a blob is binary */
const BINARY_SNIFF_BYTES = 8000;
/** Above this many add×delete candidate pairs only exact renames are detected */
const RENAME_CANDIDATE_LIMIT = 10_000;

interface BlobChange {
  path: string;
  oldOid?: string;
  newOid?: string;
  oldContent?: Uint8Array;
  newContent?: Uint8Array;
}

interface BlobSide {
  path: string;
  oid: string;
  bytes: Uint8Array;
}

/**
 * Format a git author time as ISO-8601 with its UTC offset.
 *
 * isomorphic-git reports timezoneOffset with the sign of
 * Date#getTimezoneOffset: +02:00 arrives as -120.
 */
export function formatCommitDate(timestamp: number, timezoneOffset: number): string {
  const offsetMinutes = timezoneOffset === 0 ? 0 : -timezoneOffset;
  const local = new Date((timestamp + offsetMinutes * 60) * 1000).toISOString().slice(0, 19);
  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);
  const hours = Math.floor(abs / 60).toString().padStart(2, "0");
  const minutes = (abs % 60).toString().padStart(2, "0");
  return `${local}${sign}${hours}:${minutes}`;
}

/**
 * Number of lines as diff tools count them (a missing final newline still ends a line)
 */
export function countLines(content: string): number {
  if (content.length === 0) return 0;
  const parts = content.split("\n").length;
  return content.endsWith("\n") ? parts - 1 : parts;
}

/**
 * git's binary heuristic: a NUL byte near the start of the blob
 */
export function isBinary(content: Uint8Array): boolean {
  return content.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

/**
 * Zero-context hunks turning oldContent into newContent
 */
export function computeHunks(path: string, oldContent: string, newContent: string): Hunk[] {
  const patch = structuredPatch(path, path, oldContent, newContent, "", "", { context: 0 });
  return patch.hunks.map((h) => ({
    oldStart: h.oldStart,
    oldCount: h.oldLines,
    newStart: h.newStart,
    newCount: h.newLines,
    lines: h.lines,
  }));
}

/**
 * Rename similarity in percent: unchanged lines over the longer version
 */
export function similarityIndex(oldContent: string, newContent: string): number {
  const longest = Math.max(countLines(oldContent), countLines(newContent));
  if (longest === 0) return 100;

  let unchanged = 0;
  for (const part of diffLines(oldContent, newContent)) {
    if (!part.added && !part.removed) {
      unchanged += part.count ?? 0;
    }
  }
  return Math.floor((unchanged * 100) / longest);
}

async function readContent(entry: WalkerEntry): Promise<Uint8Array> {
  const content = await entry.content();
  return content instanceof Uint8Array ? content : new Uint8Array(0);
}

function toCommit(entry: ReadCommitResult, sequenceIndex: number): Commit {
  const { author, message } = entry.commit;
  return {
    hash: entry.oid,
    author: author.email || author.name,
    authorName: author.name,
    date: formatCommitDate(author.timestamp, author.timezoneOffset),
    message: message.split("\n")[0].trim(),
    sequenceIndex,
  };
}

export class GitLogReader {
  // isomorphic-git pack file cache (shared across calls for performance)
  private readonly cache: Record<string, unknown> = {};
  private readonly decoder = new TextDecoder();

  /**
   * Validate that repoRoot is the root of a git repository.
   * headSha is null for a repository without commits.
   *
   * @throws SourceUnavailableError
   */
  async getRepoInfo(repoRoot: string): Promise<GitRepoInfo> {
    const absolute = resolve(repoRoot);
    if (!fs.existsSync(absolute)) {
      throw new SourceUnavailableError(repoRoot, "path does not exist");
    }

    let root: string;
    try {
      root = await git.findRoot({ fs, filepath: absolute });
    } catch {
      throw new SourceUnavailableError(repoRoot, "not a git repository");
    }
    if (resolve(root) !== absolute) {
      throw new SourceUnavailableError(repoRoot, `not the repository root (root is ${root})`);
    }

    return { repoRoot: absolute, headSha: await this.getHead(absolute) };
  }

  /** HEAD SHA, null when HEAD does not resolve yet (no commits) */
  async getHead(repoRoot: string): Promise<string | null> {
    try {
      return await git.resolveRef({ fs, dir: repoRoot, ref: "HEAD" });
    } catch {
      return null;
    }
  }

  /**
   * Stream the history window oldest-first, one CommitDiff per commit.
   *
   * @throws SourceUnavailableError on the first iteration, before anything is yielded
   */
  async *readHistory(repoRoot: string, options: HistoryReadOptions = {}): AsyncGenerator<CommitDiff> {
    const info = await this.getRepoInfo(repoRoot);
    if (!info.headSha) return;

    const window = await this.listCommits(info.repoRoot, info.headSha, options);
    for (let i = 0; i < window.length; i++) {
      const entry = window[i];
      const parentOid = entry.commit.parent[0] ?? null;
      yield {
        commit: toCommit(entry, i),
        changes: await this.diffCommit(info.repoRoot, parentOid, entry.oid),
      };
    }
  }

  /**
   * First-parent chain from HEAD: skip the newest `skip` commits, keep at
   * most `maxCommits`, return them oldest first.
   */
  async listCommits(
    repoRoot: string,
    headSha: string,
    options: HistoryReadOptions = {},
  ): Promise<ReadCommitResult[]> {
    const skip = options.skip ?? 0;
    const maxCommits = options.maxCommits ?? Number.POSITIVE_INFINITY;
    const window: ReadCommitResult[] = [];

    let oid: string | undefined = headSha;
    let position = 0;
    while (oid !== undefined && window.length < maxCommits) {
      const entry = await git.readCommit({ fs, dir: repoRoot, oid, cache: this.cache });
      if (position >= skip) {
        window.push(entry);
      }
      position++;
      oid = entry.commit.parent[0];
    }

    return window.reverse();
  }

  /**
   * File-level changes of one commit versus its parent (null = empty tree)
   */
  async diffCommit(repoRoot: string, parentOid: string | null, commitOid: string): Promise<FileChangeEvent[]> {
    const blobChanges = await this.diffTrees(repoRoot, parentOid, commitOid);

    const added: BlobSide[] = [];
    const deleted: BlobSide[] = [];
    const events: FileChangeEvent[] = [];

    for (const change of blobChanges) {
      if (change.oldOid && change.oldContent && change.newOid && change.newContent) {
        events.push(this.fileDiff("modify", change.path, change.oldContent, change.newContent));
      } else if (change.newOid && change.newContent) {
        added.push({ path: change.path, oid: change.newOid, bytes: change.newContent });
      } else if (change.oldOid && change.oldContent) {
        deleted.push({ path: change.path, oid: change.oldOid, bytes: change.oldContent });
      }
    }

    const pairs = this.pairRenames(added, deleted);
    const renamedFrom = new Set(pairs.map((p) => p.from.path));
    const renamedTo = new Set(pairs.map((p) => p.to.path));

    for (const { from, to, similarity } of pairs) {
      const binary = isBinary(from.bytes) || isBinary(to.bytes);
      const oldText = binary ? "" : this.decoder.decode(from.bytes);
      const newText = binary ? "" : this.decoder.decode(to.bytes);
      events.push({
        kind: "rename",
        oldPath: from.path,
        newPath: to.path,
        similarity,
        oldLineCount: countLines(oldText),
        newLineCount: countLines(newText),
        binary,
        hunks: binary ? [] : computeHunks(to.path, oldText, newText),
      });
    }
    for (const side of added) {
      if (!renamedTo.has(side.path)) {
        events.push(this.fileDiff("add", side.path, new Uint8Array(0), side.bytes));
      }
    }
    for (const side of deleted) {
      if (!renamedFrom.has(side.path)) {
        events.push(this.fileDiff("delete", side.path, side.bytes, new Uint8Array(0)));
      }
    }

    return events.sort((a, b) => {
      const pathA = a.kind === "rename" ? a.newPath : a.path;
      const pathB = b.kind === "rename" ? b.newPath : b.path;
      return pathA < pathB ? -1 : pathA > pathB ? 1 : 0;
    });
  }

  private fileDiff(
    kind: "add" | "modify" | "delete",
    path: string,
    oldBytes: Uint8Array,
    newBytes: Uint8Array,
  ): FileChangeEvent {
    const binary = isBinary(oldBytes) || isBinary(newBytes);
    if (binary) {
      return { kind, path, oldLineCount: 0, newLineCount: 0, binary, hunks: [] };
    }
    const oldText = this.decoder.decode(oldBytes);
    const newText = this.decoder.decode(newBytes);
    return {
      kind,
      path,
      oldLineCount: countLines(oldText),
      newLineCount: countLines(newText),
      binary,
      hunks: computeHunks(path, oldText, newText),
    };
  }

  /**
   * Pair added with deleted paths: exact blob matches first, then the best
   * line-similarity partner. Low-similarity pairs are still reported; the
   * rename threshold is applied by the consumer.
   */
  private pairRenames(
    added: BlobSide[],
    deleted: BlobSide[],
  ): Array<{ from: BlobSide; to: BlobSide; similarity: number }> {
    const pairs: Array<{ from: BlobSide; to: BlobSide; similarity: number }> = [];
    const usedFrom = new Set<string>();
    const usedTo = new Set<string>();

    for (const to of added) {
      const from = deleted.find((d) => d.oid === to.oid && !usedFrom.has(d.path));
      if (from) {
        pairs.push({ from, to, similarity: 100 });
        usedFrom.add(from.path);
        usedTo.add(to.path);
      }
    }

    const openAdded = added.filter((a) => !usedTo.has(a.path) && !isBinary(a.bytes));
    const openDeleted = deleted.filter((d) => !usedFrom.has(d.path) && !isBinary(d.bytes));
    if (openAdded.length * openDeleted.length > RENAME_CANDIDATE_LIMIT) {
      return pairs;
    }

    const deletedTexts = openDeleted.map((from) => ({ from, text: this.decoder.decode(from.bytes) }));
    const candidates: Array<{ from: BlobSide; to: BlobSide; similarity: number }> = [];
    for (const to of openAdded) {
      const newText = this.decoder.decode(to.bytes);
      for (const { from, text } of deletedTexts) {
        const similarity = similarityIndex(text, newText);
        if (similarity > 0) {
          candidates.push({ from, to, similarity });
        }
      }
    }

    candidates.sort(
      (a, b) =>
        b.similarity - a.similarity ||
        a.to.path.localeCompare(b.to.path) ||
        a.from.path.localeCompare(b.from.path),
    );
    for (const candidate of candidates) {
      if (usedFrom.has(candidate.from.path) || usedTo.has(candidate.to.path)) continue;
      pairs.push(candidate);
      usedFrom.add(candidate.from.path);
      usedTo.add(candidate.to.path);
    }

    return pairs;
  }

  /**
   * Walk parent and commit trees together and collect changed blobs.
   * Identical subtrees are pruned; mode-only changes keep the same oid and
   * never show up. Submodule entries are skipped.
   */
  private async diffTrees(repoRoot: string, parentOid: string | null, commitOid: string): Promise<BlobChange[]> {
    const changes: BlobChange[] = [];
    const trees = parentOid
      ? [git.TREE({ ref: parentOid }), git.TREE({ ref: commitOid })]
      : [git.TREE({ ref: commitOid })];

    await git.walk({
      fs,
      dir: repoRoot,
      trees,
      cache: this.cache,
      map: async (filepath: string, entries: Array<WalkerEntry | null>) => {
        const before = parentOid ? entries[0] : null;
        const after = parentOid ? entries[1] : entries[0];

        const beforeOid = before ? await before.oid() : undefined;
        const afterOid = after ? await after.oid() : undefined;
        if (beforeOid === afterOid) return null;

        const beforeType = before ? await before.type() : undefined;
        const afterType = after ? await after.type() : undefined;
        if (filepath === ".") return true;

        const change: BlobChange = { path: filepath };
        if (before && beforeType === "blob") {
          change.oldOid = beforeOid;
          change.oldContent = await readContent(before);
        }
        if (after && afterType === "blob") {
          change.newOid = afterOid;
          change.newContent = await readContent(after);
        }
        if (change.oldOid || change.newOid) {
          changes.push(change);
        }
        // descend only where a tree is involved; blobs and submodules end here
        return beforeType === "tree" || afterType === "tree" ? true : null;
      },
    });

    return changes;
  }
}
