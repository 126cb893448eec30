#!/usr/bin/env node
/**
 * EvoMemory MCP Server (stdio).
 * Run: npx tsx src/mcp.ts   (EVOMEMORY_DB=/tmp/test.db for an isolated store)
 */
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { openDb } from "./db.js";
import { EvoMemory } from "./evomemory.js";
import { log } from "./log.js";
import { createMcpServer } from "./mcp-server.js";

async function main() {
  const config = loadConfig();
  const db = openDb(config.dbPath);
  const memory = new EvoMemory(db, { settings: config });
  const server = createMcpServer(memory);

  const shutdown = () => {
    db.close();
    process.exit(0);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  await server.connect(new StdioServerTransport());
  log("info", `EvoMemory MCP server ready (${config.dbPath})`);
}

main().catch((err) => {
  log("error", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
