#!/usr/bin/env node
/**
 * MCP stdio transport entry point.
 *
 * Usage: PATTERNS_DIR=./patterns pattern-library-mcp
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config/loader.js';
import { initializeApp } from './server.js';
import { createMcpServer } from './mcp/index.js';

async function main() {
  // Redirect all console to stderr so stdout stays clean for MCP JSON-RPC
  console.log = (...args: unknown[]) => process.stderr.write(args.map(String).join(' ') + '\n');
  console.warn = (...args: unknown[]) => process.stderr.write(args.map(String).join(' ') + '\n');
  console.error = (...args: unknown[]) => process.stderr.write(args.map(String).join(' ') + '\n');

  console.log('Starting pattern library MCP server');

  const config = await loadConfig();
  const ctx = await initializeApp(config);
  const mcpServer = createMcpServer(ctx);

  const transport = new StdioServerTransport();
  await mcpServer.connect(transport);

  console.log('MCP server connected via stdio');
}

main().catch((err) => {
  process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
