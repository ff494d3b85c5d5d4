/**
 * Tests for application bootstrap and the HTTP server.
 */

import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import type { FastifyInstance } from 'fastify';

import { createServer, initializeApp, type AppContext } from './server.js';
import { DEFAULT_SERVER_CONFIG } from './config/types.js';

const GOOD_DOC = '---\npattern: retry-backoff\ncategory: resilience\n---\n\nBody.\n';

const MCP_HEADERS = {
  'content-type': 'application/json',
  accept: 'application/json, text/event-stream',
};

const INITIALIZE_REQUEST = {
  jsonrpc: '2.0',
  id: 1,
  method: 'initialize',
  params: {
    protocolVersion: '2025-03-26',
    capabilities: {},
    clientInfo: { name: 'test-client', version: '1.0.0' },
  },
};

const LIST_PATTERNS_REQUEST = {
  jsonrpc: '2.0',
  id: 2,
  method: 'tools/call',
  params: { name: 'list_patterns', arguments: {} },
};

/**
 * Read the JSON-RPC message from a plain JSON or single-event SSE body.
 */
function rpcMessage(body: string): unknown {
  const dataLine = body.split('\n').find(line => line.startsWith('data: '));
  return JSON.parse(dataLine ? dataLine.slice('data: '.length) : body);
}

describe('server', () => {
  let testDir: string;
  let ctx: AppContext;
  let fastify: FastifyInstance;

  beforeAll(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    testDir = join(tmpdir(), `server-test-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
    await writeFile(join(testDir, 'retry-backoff.md'), GOOD_DOC);
    await writeFile(join(testDir, 'broken.md'), 'no header');

    ctx = await initializeApp({
      patternsDir: testDir,
      server: { ...DEFAULT_SERVER_CONFIG, logLevel: 'error' },
    });
    fastify = await createServer(ctx);
  });

  afterAll(async () => {
    await fastify.close();
    await rm(testDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('initializeApp', () => {
    it('loads well-formed patterns and records skipped files', () => {
      expect(ctx.store.size).toBe(1);
      expect(ctx.loadErrors).toEqual([{ path: 'broken.md', error: 'Missing opening --- delimiter' }]);
    });

    it('starts with zero patterns when the directory is missing', async () => {
      const empty = await initializeApp({
        patternsDir: join(testDir, 'missing'),
        server: DEFAULT_SERVER_CONFIG,
      });

      expect(empty.store.size).toBe(0);
      expect(empty.store.list()).toEqual([]);
    });
  });

  describe('createServer', () => {
    it('reports health with the pattern count', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: 'ok', patterns: 1 });
    });

    it('answers initialize and tools/call on every POST to the MCP endpoint', async () => {
      for (let round = 0; round < 2; round++) {
        const init = await fastify.inject({
          method: 'POST',
          url: '/mcp',
          headers: MCP_HEADERS,
          payload: INITIALIZE_REQUEST,
        });

        expect(init.statusCode).toBe(200);
        expect(rpcMessage(init.body)).toMatchObject({
          jsonrpc: '2.0',
          id: 1,
          result: { serverInfo: { name: 'pattern-library', version: '1.0.0' } },
        });

        const call = await fastify.inject({
          method: 'POST',
          url: '/mcp',
          headers: MCP_HEADERS,
          payload: LIST_PATTERNS_REQUEST,
        });

        expect(call.statusCode).toBe(200);
        expect(rpcMessage(call.body)).toEqual({
          jsonrpc: '2.0',
          id: 2,
          result: { content: [{ type: 'text', text: '- retry-backoff (resilience)' }] },
        });
      }
    });

    it('rejects a POST body that is not JSON with 400', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/mcp',
        headers: MCP_HEADERS,
        payload: '{not json',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ statusCode: 400 });
    });

    it('rejects GET on the MCP endpoint in stateless mode', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/mcp' });

      expect(response.statusCode).toBe(405);
    });

    it('rejects DELETE on the MCP endpoint in stateless mode', async () => {
      const response = await fastify.inject({ method: 'DELETE', url: '/mcp' });

      expect(response.statusCode).toBe(405);
    });
  });
});
