/**
 * Fastify plugin that mounts MCP on a route prefix.
 *
 * Registers POST / for JSON-RPC requests (stateless Streamable HTTP): every
 * request gets its own MCP server and transport, closed with the response.
 * Returns 405 for GET / and DELETE / (no SSE or session teardown in stateless mode)
 * and 400 for a body that is not JSON.
 */

import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

const INTERNAL_ERROR_RESPONSE = {
  jsonrpc: '2.0',
  error: { code: -32603, message: 'Internal server error' },
  id: null,
};

export interface McpPluginOptions extends FastifyPluginOptions {
  createMcpServer: () => McpServer;
}

export async function mcpPlugin(
  fastify: FastifyInstance,
  opts: McpPluginOptions
): Promise<void> {
  // Disable Fastify body parsing for this scope: MCP transport parses raw body
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, body, done) => {
    try {
      done(null, JSON.parse(String(body)));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      done(Object.assign(new Error(`Invalid JSON body: ${message}`), { statusCode: 400 }), undefined);
    }
  });

  // POST /: handle MCP JSON-RPC requests
  fastify.post('/', async (request, reply) => {
    const mcpServer = opts.createMcpServer();
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    // Fastify must not send a second response
    reply.hijack();

    reply.raw.on('close', () => {
      transport.close().catch((err: unknown) => request.log.warn({ err }, 'Failed to close MCP transport'));
      mcpServer.close().catch((err: unknown) => request.log.warn({ err }, 'Failed to close MCP server'));
    });

    try {
      // Cast needed because SDK Transport type doesn't align with exactOptionalPropertyTypes
      await mcpServer.connect(transport as unknown as Transport);

      await transport.handleRequest(request.raw, reply.raw, request.body);
    } catch (err) {
      request.log.error({ err }, 'MCP request failed');
      // The reply is hijacked, so Fastify's error handler cannot answer
      if (!reply.raw.headersSent) {
        reply.raw.writeHead(500, { 'content-type': 'application/json' });
        reply.raw.end(JSON.stringify(INTERNAL_ERROR_RESPONSE));
      }
    }
  });

  // GET / and DELETE /: not supported in stateless mode
  fastify.get('/', async (_request, reply) => {
    return reply.code(405).send({ error: 'Method Not Allowed: stateless mode, no SSE' });
  });

  fastify.delete('/', async (_request, reply) => {
    return reply.code(405).send({ error: 'Method Not Allowed: stateless mode, no session teardown' });
  });
}
