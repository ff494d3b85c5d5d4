/**
 * Server entry point for the pattern library.
 *
 * This module:
 * - Loads the pattern collection once and builds the store
 * - Creates the Fastify server exposing MCP over Streamable HTTP
 * - Provides both programmatic API and CLI usage
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';

import { loadConfig } from './config/loader.js';
import type { AppConfig } from './config/types.js';
import { loadAllPatterns } from './store/PatternLoader.js';
import { PatternStore, createPatternStore } from './store/PatternStore.js';
import type { PatternLoadError } from './store/types.js';
import { createMcpServer, mcpPlugin } from './mcp/index.js';

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  config: AppConfig;
  store: PatternStore;
  /** Files skipped while loading (diagnostics only) */
  loadErrors: PatternLoadError[];
}

/**
 * Initialize all application components.
 *
 * Patterns are loaded exactly once; later writes are not picked up until the
 * process restarts.
 */
export async function initializeApp(config: AppConfig): Promise<AppContext> {
  console.log(`Loading patterns from: ${config.patternsDir}`);

  const loadResult = await loadAllPatterns(config.patternsDir);

  if (loadResult.errors.length > 0) {
    console.warn('Pattern loading warnings:');
    for (const err of loadResult.errors) {
      console.warn(`  - ${err.path}: ${err.error}`);
    }
  }

  console.log(`Loaded ${loadResult.patterns.length} patterns`);

  const store = createPatternStore(loadResult.patterns, {
    patternsDir: config.patternsDir,
  });

  return {
    config,
    store,
    loadErrors: loadResult.errors,
  };
}

/**
 * Create and configure a Fastify server.
 */
export async function createServer(ctx: AppContext): Promise<FastifyInstance> {
  const { server: opts } = ctx.config;

  const fastify = Fastify({
    logger: {
      level: opts.logLevel,
    },
  });

  if (opts.cors.enabled) {
    await fastify.register(cors, {
      origin: opts.cors.origins.includes('*') ? true : opts.cors.origins,
      methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'Mcp-Session-Id', 'Mcp-Protocol-Version'],
    });
  }

  fastify.get('/health', async () => ({
    status: 'ok',
    patterns: ctx.store.size,
  }));

  await fastify.register(mcpPlugin, {
    prefix: '/mcp',
    createMcpServer: () => createMcpServer(ctx),
  });

  return fastify;
}

/**
 * Start the server.
 */
export async function startServer(config: AppConfig): Promise<void> {
  const { port, host } = config.server;

  try {
    const ctx = await initializeApp(config);
    const fastify = await createServer(ctx);

    await fastify.listen({ port, host });

    console.log(`Server listening on http://${host}:${port}`);
    console.log(`MCP endpoint: http://${host}:${port}/mcp`);

    const shutdown = async () => {
      console.log('\nShutting down...');
      await fastify.close();
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
  } catch (err) {
    console.error('Failed to start server:', err);
    process.exit(1);
  }
}

/**
 * CLI entry point.
 */
async function main() {
  const config = await loadConfig();
  await startServer(config);
}

// Run if executed directly
// Note: ESM doesn't have require.main, use import.meta instead
const isMain = process.argv[1]?.endsWith('server.js') ||
               process.argv[1]?.endsWith('server.ts');

if (isMain) {
  main().catch((err) => {
    console.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
}
