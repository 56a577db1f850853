import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { escapeCsvField, formatCsv, writeCsv } from "../../../src/code/emitter/csv-writer.js";

const COLUMNS = ["name", "count"] as const;

describe("escapeCsvField", () => {
  it("should leave plain values untouched", () => {
    expect(escapeCsvField("plain")).toBe("plain");
    expect(escapeCsvField(42)).toBe("42");
  });

  it("should quote values with separators, quotes or line breaks", () => {
    expect(escapeCsvField("a,b")).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField("two\nlines")).toBe('"two\nlines"');
  });

  it("should not quote the path separator", () => {
    expect(escapeCsvField("a.txt;b.txt")).toBe("a.txt;b.txt");
  });
});

describe("formatCsv", () => {
  it("should write a header and CRLF-terminated rows", () => {
    const csv = formatCsv(COLUMNS, [
      { name: "x", count: 1 },
      { name: "y,z", count: 2 },
    ]);

    expect(csv).toBe('name,count\r\nx,1\r\n"y,z",2\r\n');
  });

  it("should omit the header on request", () => {
    expect(formatCsv(COLUMNS, [{ name: "x", count: 1 }], false)).toBe("x,1\r\n");
  });
});

describe("writeCsv", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "line-ledger-csv-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should overwrite an existing file by default", async () => {
    const path = join(dir, "out.csv");
    await writeFile(path, "stale\r\n");

    const result = await writeCsv(path, COLUMNS, [{ name: "x", count: 1 }]);

    expect(result).toEqual({ path, rowsWritten: 1, headerWritten: true });
    expect(await readFile(path, "utf-8")).toBe("name,count\r\nx,1\r\n");
  });

  it("should append without repeating the header", async () => {
    const path = join(dir, "out.csv");

    const first = await writeCsv(path, COLUMNS, [{ name: "x", count: 1 }], { append: true });
    const second = await writeCsv(path, COLUMNS, [{ name: "y", count: 2 }], { append: true });

    expect(first.headerWritten).toBe(true);
    expect(second.headerWritten).toBe(false);
    expect(await readFile(path, "utf-8")).toBe("name,count\r\nx,1\r\ny,2\r\n");
  });

  it("should write the header when appending to an empty file", async () => {
    const path = join(dir, "empty.csv");
    await writeFile(path, "");

    const result = await writeCsv(path, COLUMNS, [], { append: true });

    expect(result.headerWritten).toBe(true);
    expect(await readFile(path, "utf-8")).toBe("name,count\r\n");
  });
});
