/**
 * Environment configuration
 *
 * Every setting can be overridden per call through the analyze_history tool;
 * the environment provides the defaults.
 */

import { z } from "zod";

import { DEFAULT_RENAME_THRESHOLD } from "./code/ledger/index.js";

const emptyAsUndefined = (value: unknown) => (value === "" ? undefined : value);

const BooleanFlagSchema = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  LEDGER_REPO_PATH: z.preprocess(emptyAsUndefined, z.string().default(".")),
  LEDGER_MAX_COMMITS: z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().optional()),
  LEDGER_SKIP: z.preprocess(emptyAsUndefined, z.coerce.number().int().nonnegative().default(0)),
  LEDGER_APPEND: z.preprocess(emptyAsUndefined, BooleanFlagSchema.default("false")),
  LEDGER_RENAME_THRESHOLD: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().min(0).max(100).default(DEFAULT_RENAME_THRESHOLD),
  ),
  LEDGER_STRICT: z.preprocess(emptyAsUndefined, BooleanFlagSchema.default("false")),
  LEDGER_OUTPUT: z.preprocess(emptyAsUndefined, z.string().optional()),
  LEDGER_SUMMARY_OUTPUT: z.preprocess(emptyAsUndefined, z.string().optional()),
  LEDGER_PATH_PATTERN: z.preprocess(emptyAsUndefined, z.string().optional()),
});

export interface LedgerConfig {
  repoPath: string;
  maxCommits?: number;
  skip: number;
  /** Append to existing CSV outputs instead of overwriting them */
  append: boolean;
  renameThreshold: number;
  /** Abort on ReconciliationError instead of degrading the file */
  strict: boolean;
  outputPath?: string;
  summaryOutputPath?: string;
  pathPattern?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }

  const e = parsed.data;
  return {
    repoPath: e.LEDGER_REPO_PATH,
    maxCommits: e.LEDGER_MAX_COMMITS,
    skip: e.LEDGER_SKIP,
    append: e.LEDGER_APPEND,
    renameThreshold: e.LEDGER_RENAME_THRESHOLD,
    strict: e.LEDGER_STRICT,
    outputPath: e.LEDGER_OUTPUT,
    summaryOutputPath: e.LEDGER_SUMMARY_OUTPUT,
    pathPattern: e.LEDGER_PATH_PATTERN,
  };
}
