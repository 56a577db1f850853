/**
 * Vitest setup file
 */

import { tmpdir } from "node:os";
import { join } from "node:path";

// Keep debug session logs out of the home directory when DEBUG is on
process.env.LEDGER_LOG_DIR = process.env.LEDGER_LOG_DIR || join(tmpdir(), "line-ledger-test-logs");
// Git-backed tests rely on a stable default threshold
delete process.env.LEDGER_RENAME_THRESHOLD;
