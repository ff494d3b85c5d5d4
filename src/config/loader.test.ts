/**
 * Tests for the configuration loader.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { ConfigValidationError, loadConfig, parseServerConfig, resolvePatternsDir } from './loader.js';
import { DEFAULT_SERVER_CONFIG } from './types.js';

describe('config loader', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `patterns-config-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  describe('resolvePatternsDir', () => {
    it('fails when PATTERNS_DIR is absent', () => {
      expect(() => resolvePatternsDir({})).toThrow(ConfigValidationError);
    });

    it('fails when PATTERNS_DIR is empty', () => {
      expect(() => resolvePatternsDir({ PATTERNS_DIR: '  ' })).toThrow(
        "Config validation error at 'PATTERNS_DIR': PATTERNS_DIR environment variable must be set"
      );
    });

    it('resolves the directory to an absolute path', () => {
      expect(resolvePatternsDir({ PATTERNS_DIR: 'patterns' })).toBe(resolve('patterns'));
    });
  });

  describe('loadConfig', () => {
    it('rejects a missing PATTERNS_DIR', async () => {
      await expect(loadConfig({ env: {} })).rejects.toBeInstanceOf(ConfigValidationError);
    });

    it('uses defaults when no config file is given', async () => {
      const config = await loadConfig({ env: { PATTERNS_DIR: testDir } });

      expect(config).toEqual({ patternsDir: testDir, server: DEFAULT_SERVER_CONFIG });
    });

    it('reads the server section with environment substitution', async () => {
      const configPath = join(testDir, 'config.yaml');
      await writeFile(
        configPath,
        ['server:', '  port: ${PATTERN_PORT:-4000}', '  host: ${BIND_HOST}', '  cors: false', ''].join('\n')
      );

      const config = await loadConfig({
        configPath,
        env: { PATTERNS_DIR: testDir, BIND_HOST: '127.0.0.1' },
      });

      expect(config.server).toEqual({
        port: 4000,
        host: '127.0.0.1',
        logLevel: 'info',
        cors: { enabled: false, origins: ['*'] },
      });
    });

    it('lets PORT, HOST and LOG_LEVEL override the file', async () => {
      const configPath = join(testDir, 'config.yaml');
      await writeFile(configPath, 'server:\n  port: 4000\n  logLevel: warn\n');

      const config = await loadConfig({
        configPath,
        env: { PATTERNS_DIR: testDir, PORT: '5000', HOST: 'localhost', LOG_LEVEL: 'debug' },
      });

      expect(config.server.port).toBe(5000);
      expect(config.server.host).toBe('localhost');
      expect(config.server.logLevel).toBe('debug');
    });

    it('falls back to defaults when the config file is missing', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      const config = await loadConfig({
        configPath: join(testDir, 'absent.yaml'),
        env: { PATTERNS_DIR: testDir },
      });

      expect(config.server).toEqual(DEFAULT_SERVER_CONFIG);
      expect(warn).toHaveBeenCalledOnce();
    });

    it('reads the config path from CONFIG_PATH', async () => {
      const configPath = join(testDir, 'from-env.yaml');
      await writeFile(configPath, 'server:\n  port: 4100\n');

      const config = await loadConfig({ env: { PATTERNS_DIR: testDir, CONFIG_PATH: configPath } });

      expect(config.server.port).toBe(4100);
    });

    it('rejects an invalid PORT', async () => {
      await expect(loadConfig({ env: { PATTERNS_DIR: testDir, PORT: 'abc' } })).rejects.toThrow(
        "Config validation error at 'env.port': port must be a number between 1 and 65535"
      );
    });

    it('rejects malformed YAML', async () => {
      const configPath = join(testDir, 'config.yaml');
      await writeFile(configPath, 'server: [unclosed\n');

      await expect(loadConfig({ configPath, env: { PATTERNS_DIR: testDir } })).rejects.toThrow(
        /^Failed to parse config file/
      );
    });
  });

  describe('parseServerConfig', () => {
    it('returns an empty object for a missing section', () => {
      expect(parseServerConfig(undefined)).toEqual({});
    });

    it('rejects an unknown log level', () => {
      expect(() => parseServerConfig({ logLevel: 'verbose' })).toThrow(
        "Config validation error at 'server.logLevel': logLevel must be one of: debug, info, warn, error"
      );
    });

    it('rejects an out-of-range port', () => {
      expect(() => parseServerConfig({ port: 70000 })).toThrow(ConfigValidationError);
    });

    it('merges partial cors settings with defaults', () => {
      expect(parseServerConfig({ cors: { origins: ['https://example.test'] } })).toEqual({
        cors: { enabled: true, origins: ['https://example.test'] },
      });
    });

    it('rejects non-string origins', () => {
      expect(() => parseServerConfig({ cors: { origins: [1] } })).toThrow(
        "Config validation error at 'server.cors.origins': origins must be a list of strings"
      );
    });
  });
});
