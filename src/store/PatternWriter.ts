/**
 * PatternWriter: Persists new pattern documents.
 *
 * The writer does not validate or sanitize the name: callers must run
 * validatePatternName first. An existing file with the same name is
 * overwritten. The in-memory collection is never touched, so a written
 * pattern only becomes visible after the next startup.
 */

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { PATTERN_FILE_EXTENSION, serializePattern } from './PatternParser.js';
import type { NewPatternInput } from './types.js';

/**
 * Path a pattern with the given name is written to.
 */
export function patternFilePath(patternsDir: string, name: string): string {
  return join(patternsDir, `${name}${PATTERN_FILE_EXTENSION}`);
}

/**
 * Serialize and write a pattern document.
 *
 * @returns The path written
 * @throws The underlying file system error
 */
export async function writePattern(patternsDir: string, input: NewPatternInput): Promise<string> {
  const filePath = patternFilePath(patternsDir, input.name);
  await writeFile(filePath, serializePattern(input), 'utf-8');
  return filePath;
}
