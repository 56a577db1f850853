import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { TestRepo } from "../../tests/helpers/git-repo.js";
import type { LedgerConfig } from "../config.js";
import { analyzeHistory, registerHistoryTools } from "./history.js";

function configFor(repoPath: string, overrides: Partial<LedgerConfig> = {}): LedgerConfig {
  return { repoPath, skip: 0, append: false, renameThreshold: 50, strict: false, ...overrides };
}

describe("analyzeHistory", () => {
  let repo: TestRepo;
  let outDir: string;

  beforeEach(async () => {
    repo = await TestRepo.create();
    outDir = await mkdtemp(join(tmpdir(), "line-ledger-tool-"));
    await repo.write("f.txt", "a\nb\nc\n");
    await repo.commit("create f");
    await repo.write("f.txt", "a\nB\nc\nd\n");
    await repo.commit("edit f");
  });

  afterEach(async () => {
    await repo.cleanup();
    await rm(outDir, { recursive: true, force: true });
  });

  it("should summarize the analysis of the configured repository", async () => {
    const result = await analyzeHistory({}, { config: configFor(repo.dir) });

    expect(result.isError).toBeUndefined();
    const text = result.content[0].text;
    expect(text).toMatch(/^History analysis completed: 2 commits, 3 records in /);
    expect(text).toContain("- Additions: 2\n- Deletions: 0\n- Modifications: 1\n- Later modified: 1\n");
  });

  it("should let arguments override the configuration", async () => {
    const result = await analyzeHistory({ path: repo.dir, maxCommits: 1 }, { config: configFor(join(outDir, "nope")) });

    expect(result.content[0].text).toMatch(/^History analysis completed: 1 commits, 2 records/);
  });

  it("should write CSV outputs and mention them", async () => {
    const outputPath = join(outDir, "records.csv");

    const result = await analyzeHistory({ outputPath }, { config: configFor(repo.dir) });

    expect(result.content[0].text).toContain(`Records written to ${outputPath} (3 rows)`);
    const lines = (await readFile(outputPath, "utf-8")).split("\r\n");
    expect(lines).toHaveLength(5);
    expect(lines[0]).toBe("commit_hash,author,date,modified_at,modification_type,file_path,start_line,end_line,line_count");
  });

  it("should append a JSON preview of the first rows", async () => {
    const result = await analyzeHistory({ previewRows: 1 }, { config: configFor(repo.dir) });

    const preview = JSON.parse(result.content[0].text.split("\n\n").slice(-1)[0]);
    expect(preview).toHaveLength(1);
    expect(preview[0]).toMatchObject({ modification_type: "ADDITION", file_path: "f.txt", start_line: 1, end_line: 3 });
  });

  it("should report a missing repository as a tool error", async () => {
    const result = await analyzeHistory({ path: join(outDir, "missing") }, { config: configFor(repo.dir) });

    expect(result.isError).toBe(true);
    expect(result.content[0].text).toMatch(/^Error: Repository unavailable at .*missing: path does not exist$/);
  });
});

describe("registerHistoryTools", () => {
  it("should register analyze_history", () => {
    const server = new McpServer({ name: "test", version: "0.0.0" });
    const registerTool = vi.spyOn(server, "registerTool");

    registerHistoryTools(server, { config: configFor(".") });

    expect(registerTool).toHaveBeenCalledWith(
      "analyze_history",
      expect.objectContaining({ title: "Analyze History" }),
      expect.any(Function),
    );
  });
});
