/**
 * PatternLoader: Loads pattern documents from the file system.
 *
 * This module handles:
 * - Enumerating the patterns directory (non-recursive)
 * - Reading every *.md entry and running the parser on it
 * - Collecting per-file failures as diagnostics
 *
 * It never throws. An unreadable directory yields an empty collection so the
 * server can still start and report zero patterns.
 */

import { readFile, readdir } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { createPatternCollection, type PatternRecord } from '../types/PatternRecord.js';
import { PATTERN_FILE_EXTENSION, parsePattern } from './PatternParser.js';
import type { PatternLoadError, PatternLoadResult } from './types.js';

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Load a single pattern file.
 *
 * @param filePath - Path of the document
 * @returns The record, or an error message when the file is skipped
 */
export async function loadPatternFile(
  filePath: string
): Promise<{ pattern: PatternRecord } | { error: string }> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (err) {
    return { error: `Failed to read ${filePath}: ${describeError(err)}` };
  }

  const result = parsePattern(text, filePath);
  if (!result.success) {
    return { error: result.error };
  }
  return { pattern: result.pattern };
}

/**
 * Load all patterns from a directory, in directory-enumeration order.
 *
 * @param patternsDir - Directory holding the *.md documents
 */
export async function loadAllPatterns(patternsDir: string): Promise<PatternLoadResult> {
  let names: string[];
  try {
    names = await readdir(patternsDir);
  } catch (err) {
    return {
      patterns: createPatternCollection([]),
      errors: [{ path: patternsDir, error: `Cannot read patterns directory: ${describeError(err)}` }],
    };
  }

  const patterns: PatternRecord[] = [];
  const errors: PatternLoadError[] = [];

  for (const name of names) {
    if (extname(name) !== PATTERN_FILE_EXTENSION) continue;

    const filePath = join(patternsDir, name);
    const result = await loadPatternFile(filePath);

    if ('pattern' in result) {
      patterns.push(result.pattern);
    } else {
      errors.push({ path: name, error: result.error });
    }
  }

  return { patterns: createPatternCollection(patterns), errors };
}
