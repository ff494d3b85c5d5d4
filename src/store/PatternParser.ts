/**
 * PatternParser: Convert between Markdown pattern documents and PatternRecord.
 *
 * A document looks like:
 *
 * ```markdown
 * ---
 * pattern: retry-backoff
 * category: resilience
 * framework: tokio
 * projects: [billing]
 * tags: [retry, backoff]
 * ---
 *
 * Body text...
 * ```
 *
 * Parsing never throws. A malformed document yields a failed ParseResult and
 * the caller decides what to do with it (the loader skips it).
 */

import { Document, parse as parseYaml, visit } from 'yaml';
import {
  PatternMetadataSchema,
  createPatternRecord,
  toPatternMetadata,
  type PatternRecord,
} from '../types/PatternRecord.js';
import type { NewPatternInput } from './types.js';

/**
 * File extension reserved for pattern documents.
 */
export const PATTERN_FILE_EXTENSION = '.md';

const OPENING_DELIMITER = '---\n';
const HEADER_SEPARATOR = '\n---\n';

/**
 * Result of parsing a pattern document.
 */
export type ParseResult =
  | { success: true; pattern: PatternRecord }
  | { success: false; error: string };

/**
 * Parse a pattern document.
 *
 * @param text - Raw document text
 * @param filePath - Location the text was read from
 */
export function parsePattern(text: string, filePath: string): ParseResult {
  if (!text.startsWith(OPENING_DELIMITER)) {
    return { success: false, error: 'Missing opening --- delimiter' };
  }

  const rest = text.slice(OPENING_DELIMITER.length);
  const separatorIndex = rest.indexOf(HEADER_SEPARATOR);
  if (separatorIndex === -1) {
    return { success: false, error: 'Missing closing --- delimiter' };
  }

  const header = rest.slice(0, separatorIndex);
  const body = rest.slice(separatorIndex + HEADER_SEPARATOR.length);

  let parsed: unknown;
  try {
    parsed = parseYaml(header);
  } catch (err) {
    return {
      success: false,
      error: `Invalid YAML header: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  const metadata = PatternMetadataSchema.safeParse(parsed);
  if (!metadata.success) {
    const issues = metadata.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return { success: false, error: `Invalid header: ${issues}` };
  }

  return {
    success: true,
    pattern: createPatternRecord(toPatternMetadata(metadata.data), body.trim(), filePath),
  };
}

/**
 * Serialize new pattern fields to the canonical document form.
 *
 * `pattern`, `category` and `framework` are always written; `projects` and
 * `tags` only when non-empty. Lists use flow style (`[a, b]`).
 */
export function serializePattern(input: NewPatternInput): string {
  const header: Record<string, unknown> = {
    pattern: input.name,
    category: input.category,
    framework: input.framework,
  };
  if (input.projects !== undefined && input.projects.length > 0) {
    header.projects = [...input.projects];
  }
  if (input.tags.length > 0) {
    header.tags = [...input.tags];
  }

  const doc = new Document(header);
  visit(doc, {
    Seq(_key, node) {
      node.flow = true;
    },
  });

  const headerText = doc.toString({ lineWidth: 0, flowCollectionPadding: false });

  return `${OPENING_DELIMITER}${headerText}---\n\n${input.content}\n`;
}
