/**
 * Emitter module: row projections and CSV output
 */

export { RECORD_COLUMNS, toRecordRow, toRecordRows } from "./record-emitter.js";
export type { RecordColumn, RecordRow } from "./record-emitter.js";
export { SUMMARY_COLUMNS, summarizeCommits } from "./commit-summary.js";
export type { CommitSummaryRow } from "./commit-summary.js";
export { escapeCsvField, formatCsv, writeCsv } from "./csv-writer.js";
export type { CsvValue, CsvWriteOptions, CsvWriteResult } from "./csv-writer.js";
