/**
 * History analysis tools registration
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import type { LedgerConfig } from "../config.js";
import { ReconciliationError, SourceUnavailableError } from "../code/errors.js";
import type { GitLogReader } from "../code/git/index.js";
import { analyzeRepository, formatDuration, writeAnalysisOutputs } from "../code/pipeline/index.js";
import type { AnalysisResult, WrittenOutputs } from "../code/pipeline/index.js";
import * as schemas from "./schemas.js";
import type { AnalyzeHistoryArgs } from "./schemas.js";

export interface HistoryToolDependencies {
  config: LedgerConfig;
  reader?: GitLogReader;
}

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

function textResult(text: string, isError = false): ToolResult {
  return isError ? { content: [{ type: "text", text }], isError } : { content: [{ type: "text", text }] };
}

export function formatAnalysisReport(result: AnalysisResult, written: WrittenOutputs): string {
  const { stats } = result;

  let message = `History analysis ${result.status}: ${stats.commitsProcessed} commits, ${stats.recordsEmitted} records in ${formatDuration(result.durationMs)}\n`;
  message += `- Additions: ${stats.additions}\n`;
  message += `- Deletions: ${stats.deletions}\n`;
  message += `- Modifications: ${stats.modifications}\n`;
  message += `- Later modified: ${stats.backfilledRecords}\n`;
  message += `- Renames followed: ${stats.renamesFollowed}, split: ${stats.renamesSplit}\n`;
  if (stats.binaryChanges > 0) message += `- Binary changes ignored: ${stats.binaryChanges}\n`;
  if (stats.filteredChanges > 0) message += `- Changes outside the path pattern: ${stats.filteredChanges}\n`;

  if (result.skipped.length > 0) {
    message += `\nSkipped (${result.skipped.length}):\n`;
    for (const item of result.skipped) {
      message += `- [${item.reason}] ${item.commitHash.slice(0, 8)} ${item.path}: ${item.message}\n`;
    }
  }

  if (written.records) {
    message += `\nRecords written to ${written.records.path} (${written.records.rowsWritten} rows)`;
  }
  if (written.summaries) {
    message += `\nCommit summaries written to ${written.summaries.path} (${written.summaries.rowsWritten} rows)`;
  }

  return message.trimEnd();
}

/**
 * analyze_history handler; explicit arguments override the configuration
 */
export async function analyzeHistory(args: AnalyzeHistoryArgs, deps: HistoryToolDependencies): Promise<ToolResult> {
  const { config, reader } = deps;
  const repoPath = args.path ?? config.repoPath;

  let result: AnalysisResult;
  try {
    result = await analyzeRepository(
      repoPath,
      {
        maxCommits: args.maxCommits ?? config.maxCommits,
        skip: args.skip ?? config.skip,
        renameThreshold: args.renameThreshold ?? config.renameThreshold,
        strict: args.strict ?? config.strict,
        pathPattern: args.pathPattern ?? config.pathPattern,
      },
      reader,
    );
  } catch (error) {
    if (error instanceof SourceUnavailableError || error instanceof ReconciliationError) {
      return textResult(`Error: ${error.message}`, true);
    }
    throw error;
  }

  const written = await writeAnalysisOutputs(result, {
    outputPath: args.outputPath ?? config.outputPath,
    summaryOutputPath: args.summaryOutputPath ?? config.summaryOutputPath,
    append: args.append ?? config.append,
  });

  let text = formatAnalysisReport(result, written);
  const previewRows = args.previewRows ?? 0;
  if (previewRows > 0) {
    text += `\n\n${JSON.stringify(result.rows.slice(0, previewRows), null, 2)}`;
  }

  return textResult(text);
}

export function registerHistoryTools(server: McpServer, deps: HistoryToolDependencies): void {
  // analyze_history
  server.registerTool(
    "analyze_history",
    {
      title: "Analyze History",
      description:
        "Replay a git repository's first-parent history oldest-first and record, for every changed line range, " +
        "the commit that introduced it and the first later commit that altered it. " +
        "Renames at or above the similarity threshold keep line ownership.\n\n" +
        "OUTPUT: one row per hunk (commit_hash, author, date, modified_at, modification_type, file_path, " +
        "start_line, end_line, line_count), optionally written as CSV together with per-commit summaries.",
      inputSchema: schemas.AnalyzeHistorySchema,
    },
    async (args) => analyzeHistory(args, deps),
  );
}
