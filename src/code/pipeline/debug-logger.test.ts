import { afterAll, beforeEach, describe, expect, it, vi } from "vitest";
import type { LogContext } from "./debug-logger.js";

// Mock fs module before importing the module under test
vi.mock("node:fs", () => ({
  appendFileSync: vi.fn(),
  existsSync: vi.fn(() => true),
  mkdirSync: vi.fn(),
}));

// Set DEBUG before importing to ensure logger is initialized with DEBUG on
process.env.DEBUG = "true";

// Import after setting DEBUG
const { formatDuration, pipelineLog } = await import("./debug-logger.js");
const fs = await import("node:fs");

const consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

function lastLine(): string {
  const calls = consoleErrorSpy.mock.calls;
  return String(calls[calls.length - 1]?.[0]);
}

function lastData(): Record<string, unknown> {
  return JSON.parse(lastLine().split(" | ")[1]);
}

describe("DebugLogger", () => {
  const ctx: LogContext = { component: "HistoryPipeline" };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterAll(() => {
    consoleErrorSpy.mockRestore();
  });

  describe("step logging", () => {
    it("should report being enabled", () => {
      expect(pipelineLog.isEnabled()).toBe(true);
    });

    it("should log step messages with component name", () => {
      pipelineLog.step(ctx, "Test step message");

      expect(lastLine()).toContain("[HistoryPipeline] Test step message");
    });

    it("should include optional data in log output", () => {
      const data = { key: "value", count: 42 };

      pipelineLog.step(ctx, "With data", data);

      expect(lastLine()).toContain(` | ${JSON.stringify(data)}`);
    });

    it("should include timing information in logs", () => {
      pipelineLog.step(ctx, "Timed message");

      expect(lastLine()).toMatch(/^\[\+\s*\d+\.\d{3}s\]/);
    });

    it("should write to file system", () => {
      pipelineLog.step(ctx, "File test");

      expect(fs.appendFileSync).toHaveBeenCalled();
    });
  });

  describe("commitProcessed logging", () => {
    it("should log the short hash and counts", () => {
      pipelineLog.commitProcessed(ctx, "abcdef0123456789", 4, 3, 7);

      expect(lastLine()).toContain("COMMIT: abcdef01");
      expect(lastData()).toMatchObject({ sequenceIndex: 4, changes: 3, records: 7 });
    });

    it("should accumulate the record counter", () => {
      pipelineLog.commitProcessed(ctx, "a".repeat(40), 0, 1, 2);
      const first = Number(lastData().totalRecords);
      pipelineLog.commitProcessed(ctx, "b".repeat(40), 1, 1, 5);

      expect(Number(lastData().totalRecords)).toBe(first + 5);
    });
  });

  describe("skipped logging", () => {
    it("should uppercase the reason", () => {
      pipelineLog.skipped(ctx, "malformed", "src/a.ts", "hunks.0: 2 removed line(s), header says 1");

      expect(lastLine()).toContain("SKIPPED_MALFORMED");
      expect(lastData()).toMatchObject({ path: "src/a.ts", detail: "hunks.0: 2 removed line(s), header says 1" });
    });
  });

  describe("fileDegraded logging", () => {
    it("should log the degraded path and running total", () => {
      pipelineLog.fileDegraded(ctx, "src/a.ts", "diverged");
      const first = Number(lastData().totalDegraded);
      pipelineLog.fileDegraded(ctx, "src/b.ts", "diverged");

      expect(lastLine()).toContain("FILE_DEGRADED");
      expect(Number(lastData().totalDegraded)).toBe(first + 1);
    });
  });

  describe("stage profiling", () => {
    it("should count stage runs and pre-measured time", () => {
      pipelineLog.resetProfiler();

      pipelineLog.stageStart("ledger");
      pipelineLog.stageEnd("ledger");
      pipelineLog.addStageTime("read", 250);
      pipelineLog.addStageTime("read", 50);

      const summary = pipelineLog.getStageSummary();
      expect(summary.ledger?.count).toBe(1);
      expect(summary.read?.count).toBe(2);
      expect(summary.read?.totalMs).toBe(300);
      expect(summary.emit).toBeUndefined();
    });

    it("should ignore a stage end without a start", () => {
      pipelineLog.resetProfiler();

      pipelineLog.stageEnd("emit");

      expect(pipelineLog.getStageSummary()).toEqual({});
    });

    it("should write a stage table into the summary", () => {
      pipelineLog.resetProfiler();
      pipelineLog.addStageTime("classify", 1500);

      pipelineLog.summary(ctx, { commitsProcessed: 2 });

      const written = vi.mocked(fs.appendFileSync).mock.calls.map((call) => String(call[1]));
      const block = written.find((text) => text.includes("SUMMARY for HistoryPipeline"));
      expect(block).toContain('"commitsProcessed": 2');
      expect(block).toContain("STAGE PROFILING:");
      expect(block).toMatch(/classify\s+1\.5s\s+100\.0%\s+1/);
    });
  });
});

describe("formatDuration", () => {
  it("should format milliseconds, seconds and minutes", () => {
    expect(formatDuration(150)).toBe("150ms");
    expect(formatDuration(45_500)).toBe("45.5s");
    expect(formatDuration(150_000)).toBe("2m 30s");
  });

  it("should pad to the requested width", () => {
    expect(formatDuration(5, 6)).toBe("   5ms");
  });
});
