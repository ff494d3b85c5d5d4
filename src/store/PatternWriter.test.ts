/**
 * Tests for PatternWriter.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { patternFilePath, writePattern } from './PatternWriter.js';
import { serializePattern } from './PatternParser.js';
import type { NewPatternInput } from './types.js';

const INPUT: NewPatternInput = {
  name: 'new-pattern',
  category: 'web',
  framework: 'fastify',
  tags: ['http'],
  content: 'Register routes inside plugins.',
};

describe('PatternWriter', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `patterns-writer-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('derives the file name from the pattern name', () => {
    expect(patternFilePath('/data/patterns', 'retry-backoff')).toBe(join('/data/patterns', 'retry-backoff.md'));
  });

  it('writes the serialized document and returns its path', async () => {
    const filePath = await writePattern(testDir, INPUT);

    expect(filePath).toBe(join(testDir, 'new-pattern.md'));
    expect(await readFile(filePath, 'utf-8')).toBe(serializePattern(INPUT));
  });

  it('overwrites an existing document with the same name', async () => {
    await writePattern(testDir, INPUT);
    const filePath = await writePattern(testDir, { ...INPUT, content: 'Second version.' });

    const text = await readFile(filePath, 'utf-8');
    expect(text.endsWith('\n\nSecond version.\n')).toBe(true);
  });

  it('propagates file system errors', async () => {
    await expect(writePattern(join(testDir, 'missing'), INPUT)).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
