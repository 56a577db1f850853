/**
 * CSV serialization (RFC 4180 quoting, CRLF line endings)
 */

import { promises as fs } from "node:fs";

export type CsvValue = string | number;

export interface CsvWriteOptions {
  /** Append to an existing file; the header is only written when it is new or empty */
  append?: boolean;
}

export interface CsvWriteResult {
  path: string;
  rowsWritten: number;
  headerWritten: boolean;
}

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: CsvValue): string {
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatCsv<C extends string>(
  columns: readonly C[],
  rows: ReadonlyArray<Record<C, CsvValue>>,
  includeHeader = true,
): string {
  const lines: string[] = [];
  if (includeHeader) {
    lines.push(columns.map(escapeCsvField).join(","));
  }
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCsvField(row[column])).join(","));
  }
  return lines.map((line) => `${line}\r\n`).join("");
}

export async function writeCsv<C extends string>(
  path: string,
  columns: readonly C[],
  rows: ReadonlyArray<Record<C, CsvValue>>,
  options: CsvWriteOptions = {},
): Promise<CsvWriteResult> {
  const append = options.append ?? false;
  const headerWritten = !append || (await isMissingOrEmpty(path));
  const content = formatCsv(columns, rows, headerWritten);

  if (append) {
    await fs.appendFile(path, content, "utf-8");
  } else {
    await fs.writeFile(path, content, "utf-8");
  }

  return { path, rowsWritten: rows.length, headerWritten };
}

async function isMissingOrEmpty(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.size === 0;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return true;
    throw error;
  }
}
