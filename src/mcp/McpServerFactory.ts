/**
 * Factory function for creating the MCP server with all tools and resources.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../server.js';
import { registerAllTools } from './tools/index.js';
import { registerAllResources } from './resources/index.js';

export const SERVER_NAME = 'pattern-library';
export const SERVER_VERSION = '1.0.0';

export const SERVER_INSTRUCTIONS = `I manage a library of software development patterns stored as markdown files with YAML frontmatter.
Use me to discover, search, and create reusable code patterns and architectural solutions.

Available operations:
- list_patterns: Get overview of all available patterns
- search_patterns: Find patterns by text, category, framework, or tags
- get_pattern: Retrieve full content of a specific pattern
- create_pattern: Add new patterns with proper metadata

Patterns include categories like 'rust', 'aws', 'web' and frameworks like 'axum', 'lambda'.
Each pattern contains implementation details, best practices, and usage examples.

When creating patterns, include relevant tags and specify which projects used them for better discoverability.
Created patterns are written to disk immediately but only show up in list and search results after a restart.`;

/**
 * Create and configure an MCP server bound to the given AppContext.
 */
export function createMcpServer(ctx: AppContext): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
      instructions: SERVER_INSTRUCTIONS,
    }
  );

  registerAllTools(server, ctx);
  registerAllResources(server, ctx);

  return server;
}
