/**
 * MCP resources for pattern access.
 */

import { ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';

export function patternUri(name: string): string {
  return `pattern://${encodeURIComponent(name)}`;
}

export function registerPatternResources(server: McpServer, ctx: AppContext): void {
  server.resource(
    'pattern',
    new ResourceTemplate('pattern://{name}', {
      list: async () => ({
        resources: ctx.store.all().map((p) => ({
          uri: patternUri(p.metadata.pattern),
          name: p.metadata.pattern,
          description: p.metadata.framework
            ? `${p.metadata.category} / ${p.metadata.framework}`
            : p.metadata.category,
          mimeType: 'text/markdown',
        })),
      }),
    }),
    { description: 'Pattern content as Markdown' },
    async (uri, variables) => {
      const name = decodeURIComponent(String(variables.name));
      const pattern = ctx.store.get(name);
      if (!pattern) {
        return { contents: [] };
      }
      return {
        contents: [
          {
            uri: uri.href,
            mimeType: 'text/markdown',
            text: pattern.content,
          },
        ],
      };
    }
  );
}
