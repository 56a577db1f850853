/**
 * Debug Logger for History Pipeline Operations
 *
 * Writes detailed trace logs to ~/.line-ledger/logs/ (or LEDGER_LOG_DIR) when DEBUG=1
 * Helps diagnose:
 * - Per-commit processing and record counts
 * - Skipped and malformed diff events
 * - Ownership reconciliation failures and degraded files
 * - Stage timing (read, classify, ledger, emit)
 */

import { appendFileSync, existsSync, mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

const LOG_DIR = process.env.LEDGER_LOG_DIR || join(homedir(), ".line-ledger", "logs");
const DEBUG = process.env.DEBUG === "true" || process.env.DEBUG === "1";

export type PipelineStage = "read" | "classify" | "ledger" | "emit";

const STAGES: PipelineStage[] = ["read", "classify", "ledger", "emit"];

export interface LogContext {
  component: string;
  operation?: string;
  commit?: string;
}

export interface StageSummary {
  totalMs: number;
  wallMs: number;
  count: number;
  percentage: number;
}

interface StageData {
  totalMs: number;
  count: number;
  activeStarts: number[];
  firstStart: number | null;
  lastEnd: number | null;
}

class StageProfiler {
  private stages: Map<PipelineStage, StageData> = new Map();

  private getOrCreate(stage: PipelineStage): StageData {
    let data = this.stages.get(stage);
    if (!data) {
      data = { totalMs: 0, count: 0, activeStarts: [], firstStart: null, lastEnd: null };
      this.stages.set(stage, data);
    }
    return data;
  }

  startStage(stage: PipelineStage): void {
    const now = Date.now();
    const data = this.getOrCreate(stage);
    data.activeStarts.push(now);
    if (data.firstStart === null || now < data.firstStart) {
      data.firstStart = now;
    }
  }

  endStage(stage: PipelineStage): void {
    const now = Date.now();
    const data = this.getOrCreate(stage);
    const start = data.activeStarts.shift();
    if (start !== undefined) {
      data.totalMs += now - start;
      data.count++;
      if (data.lastEnd === null || now > data.lastEnd) {
        data.lastEnd = now;
      }
    }
  }

  addTime(stage: PipelineStage, durationMs: number): void {
    const now = Date.now();
    const data = this.getOrCreate(stage);
    data.totalMs += durationMs;
    data.count++;
    // Implied start time = callTime - duration
    const impliedStart = now - durationMs;
    if (data.firstStart === null || impliedStart < data.firstStart) {
      data.firstStart = impliedStart;
    }
    if (data.lastEnd === null || now > data.lastEnd) {
      data.lastEnd = now;
    }
  }

  getSummary(): Partial<Record<PipelineStage, StageSummary>> {
    const totalMs = this.getTotalMs();
    const result: Partial<Record<PipelineStage, StageSummary>> = {};

    for (const stage of STAGES) {
      const data = this.stages.get(stage);
      if (data && data.count > 0) {
        const wallMs =
          data.firstStart !== null && data.lastEnd !== null ? data.lastEnd - data.firstStart : 0;
        result[stage] = {
          totalMs: data.totalMs,
          wallMs,
          count: data.count,
          percentage: totalMs > 0 ? (data.totalMs / totalMs) * 100 : 0,
        };
      }
    }

    return result;
  }

  getTotalMs(): number {
    return Array.from(this.stages.values()).reduce((sum, d) => sum + d.totalMs, 0);
  }

  reset(): void {
    this.stages.clear();
  }
}

/**
 * Format milliseconds as human-readable duration (e.g., "2m 30s", "45.5s", "150ms")
 */
export function formatDuration(ms: number, width?: number): string {
  let result: string;
  if (ms < 1000) {
    result = `${ms}ms`;
  } else {
    const totalSeconds = ms / 1000;
    if (totalSeconds < 60) {
      result = `${totalSeconds.toFixed(1)}s`;
    } else {
      const minutes = Math.floor(totalSeconds / 60);
      const seconds = Math.round(totalSeconds % 60);
      result = `${minutes}m ${seconds.toString().padStart(2, "0")}s`;
    }
  }
  return width ? result.padStart(width) : result;
}

class DebugLogger {
  private logFile: string | null = null;
  private sessionStart: number;
  private profiler = new StageProfiler();
  private counters = {
    commits: 0,
    records: 0,
    skipped: 0,
    degradedFiles: 0,
  };

  constructor() {
    this.sessionStart = Date.now();

    if (DEBUG) {
      this.initLogFile();
    }
  }

  private initLogFile(): void {
    try {
      if (!existsSync(LOG_DIR)) {
        mkdirSync(LOG_DIR, { recursive: true });
      }

      const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
      this.logFile = join(LOG_DIR, `history-${timestamp}.log`);

      const env = (key: string, fallback: string) =>
        process.env[key] != null ? process.env[key] : `${fallback} (default)`;

      this.writeRaw(`
================================================================================
HISTORY PIPELINE DEBUG LOG - Session started at ${new Date().toISOString()}
================================================================================
ENV:
  LEDGER_REPO_PATH        = ${env("LEDGER_REPO_PATH", ".")}
  LEDGER_MAX_COMMITS      = ${env("LEDGER_MAX_COMMITS", "all")}
  LEDGER_SKIP             = ${env("LEDGER_SKIP", "0")}
  LEDGER_RENAME_THRESHOLD = ${env("LEDGER_RENAME_THRESHOLD", "50")}
  LEDGER_STRICT           = ${env("LEDGER_STRICT", "false")}
  LEDGER_APPEND           = ${env("LEDGER_APPEND", "false")}
================================================================================
`);
    } catch (error) {
      console.error("[DebugLogger] Failed to init log file:", error);
    }
  }

  private writeRaw(message: string): void {
    if (this.logFile) {
      try {
        appendFileSync(this.logFile, message + "\n");
      } catch {
        // Ignore write errors
      }
    }
  }

  private formatTime(): string {
    const elapsed = Date.now() - this.sessionStart;
    const sec = Math.floor(elapsed / 1000);
    const ms = elapsed % 1000;
    return `+${sec.toString().padStart(4, " ")}.${ms.toString().padStart(3, "0")}s`;
  }

  isEnabled(): boolean {
    return DEBUG;
  }

  /**
   * Log a pipeline step with timing
   */
  step(ctx: LogContext, message: string, data?: Record<string, unknown>): void {
    if (!DEBUG) return;

    const time = this.formatTime();
    const prefix = `[${time}] [${ctx.component}]`;
    const suffix = data ? ` | ${JSON.stringify(data)}` : "";

    const line = `${prefix} ${message}${suffix}`;
    this.writeRaw(line);
    console.error(line);
  }

  /**
   * Log one processed commit
   */
  commitProcessed(ctx: LogContext, hash: string, sequenceIndex: number, changes: number, records: number): void {
    this.counters.commits++;
    this.counters.records += records;
    this.step(ctx, `COMMIT: ${hash.slice(0, 8)}`, {
      sequenceIndex,
      changes,
      records,
      totalRecords: this.counters.records,
    });
  }

  /**
   * Log a skipped file change
   */
  skipped(ctx: LogContext, reason: string, path: string, detail: string): void {
    this.counters.skipped++;
    this.step(ctx, `SKIPPED_${reason.toUpperCase()}`, {
      path,
      detail,
      totalSkipped: this.counters.skipped,
    });
  }

  /**
   * Log a file whose provenance tracking was given up
   */
  fileDegraded(ctx: LogContext, path: string, detail: string): void {
    this.counters.degradedFiles++;
    this.step(ctx, "FILE_DEGRADED", {
      path,
      detail,
      totalDegraded: this.counters.degradedFiles,
    });
  }

  stageStart(stage: PipelineStage): void {
    this.profiler.startStage(stage);
  }

  stageEnd(stage: PipelineStage): void {
    this.profiler.endStage(stage);
  }

  /**
   * Add pre-measured time to a pipeline stage
   */
  addStageTime(stage: PipelineStage, durationMs: number): void {
    this.profiler.addTime(stage, durationMs);
  }

  getStageSummary(): Partial<Record<PipelineStage, StageSummary>> {
    return this.profiler.getSummary();
  }

  /**
   * Reset stage profiler (for a new analysis run)
   */
  resetProfiler(): void {
    this.profiler.reset();
  }

  /**
   * Log run stats summary
   */
  summary(ctx: LogContext, stats: Record<string, unknown>): void {
    const stageSummary = this.profiler.getSummary();
    const stageTotalMs = this.profiler.getTotalMs();

    let stageBlock = "";
    if (stageTotalMs > 0) {
      const W = { stage: 9, cum: 10, pct: 6, calls: 6 };
      stageBlock = "\nSTAGE PROFILING:\n";
      stageBlock += `  ${"stage".padEnd(W.stage)}  ${"cumul.".padStart(W.cum)}  ${"%".padStart(W.pct)}  ${"calls".padStart(W.calls)}\n`;
      for (const stage of STAGES) {
        const data = stageSummary[stage];
        if (data) {
          const percent = (data.percentage.toFixed(1) + "%").padStart(W.pct);
          stageBlock += `  ${stage.padEnd(W.stage)}  ${formatDuration(data.totalMs, W.cum)}  ${percent}  ${data.count.toString().padStart(W.calls)}\n`;
        }
      }
      stageBlock += `  ${"TOTAL".padEnd(W.stage)}  ${formatDuration(stageTotalMs, W.cum)}\n`;
    }

    this.writeRaw(`
--------------------------------------------------------------------------------
SUMMARY for ${ctx.component}
--------------------------------------------------------------------------------
${JSON.stringify(stats, null, 2)}
Session counters: ${JSON.stringify(this.counters)}${stageBlock}
--------------------------------------------------------------------------------
`);
  }

  /**
   * Get log file path
   */
  getLogPath(): string | null {
    return this.logFile;
  }
}

// Singleton instance
export const pipelineLog = new DebugLogger();
