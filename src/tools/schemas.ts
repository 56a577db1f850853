/**
 * Zod schemas for the MCP tools
 *
 * Note: Schemas are exported as plain objects (not wrapped in z.object()) because
 * McpServer.registerTool() expects schemas in this format.
 */

import { z } from "zod";

export const AnalyzeHistorySchema = {
  path: z
    .string()
    .optional()
    .describe("Path to the repository root (default: LEDGER_REPO_PATH or the working directory)"),
  maxCommits: z
    .number()
    .int()
    .positive()
    .optional()
    .describe("Maximum number of commits to analyze, counted back from HEAD after skip"),
  skip: z.number().int().nonnegative().optional().describe("Number of newest commits to leave out"),
  renameThreshold: z
    .number()
    .min(0)
    .max(100)
    .optional()
    .describe("Minimum similarity (0-100) for a rename to keep line ownership (default: 50)"),
  strict: z
    .boolean()
    .optional()
    .describe("Abort on the first ownership divergence instead of dropping tracking for that file"),
  pathPattern: z
    .string()
    .optional()
    .describe("Glob pattern; only matching files are analyzed (e.g. 'src/**/*.ts')"),
  outputPath: z.string().optional().describe("CSV file for modification records"),
  summaryOutputPath: z.string().optional().describe("CSV file for per-commit summaries"),
  append: z.boolean().optional().describe("Append to existing CSV files instead of overwriting them"),
  previewRows: z
    .number()
    .int()
    .nonnegative()
    .optional()
    .describe("Include the first N record rows as JSON in the response (default: 0)"),
};

export type AnalyzeHistoryArgs = z.infer<z.ZodObject<typeof AnalyzeHistorySchema>>;
