#!/usr/bin/env node
/**
 * MCP server entry point (stdio transport)
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { pipelineLog } from "./code/pipeline/debug-logger.js";
import { loadConfig } from "./config.js";
import { registerHistoryTools } from "./tools/history.js";

const SERVER_NAME = "line-ledger-mcp";
const SERVER_VERSION = "0.1.0";

function createServer(config = loadConfig()): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  registerHistoryTools(server, { config });
  return server;
}

async function main(): Promise<void> {
  const server = createServer();
  await server.connect(new StdioServerTransport());

  console.error(`[${SERVER_NAME}] Listening on stdio`);
  const logPath = pipelineLog.getLogPath();
  if (logPath) {
    console.error(`[${SERVER_NAME}] Debug log: ${logPath}`);
  }
}

main().catch((error: unknown) => {
  console.error(`[${SERVER_NAME}] Fatal:`, error);
  process.exit(1);
});
