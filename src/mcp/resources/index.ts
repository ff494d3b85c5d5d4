/**
 * Aggregator that registers all MCP resources on the server.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { registerPatternResources } from './patternResources.js';

export function registerAllResources(server: McpServer, ctx: AppContext): void {
  registerPatternResources(server, ctx);
}
