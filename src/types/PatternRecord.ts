/**
 * PatternRecord: In-memory form of a pattern document.
 *
 * A pattern document is a Markdown file whose YAML header block carries the
 * metadata and whose body carries the free-text content. Records are built
 * only by the loader at startup and are never mutated afterwards.
 */

import { z } from 'zod';

/**
 * Shape of the YAML header block.
 *
 * `framework`, `projects` and `tags` may be omitted or set to an explicit
 * YAML null; both mean "none".
 */
export const PatternMetadataSchema = z.object({
  pattern: z.string().min(1),
  category: z.string().min(1),
  framework: z.string().nullish(),
  projects: z.array(z.string()).nullish(),
  tags: z.array(z.string()).nullish(),
});

export type PatternHeader = z.infer<typeof PatternMetadataSchema>;

/**
 * Metadata of a pattern.
 */
export interface PatternMetadata {
  /** Pattern name, the identifier used by lookups */
  readonly pattern: string;
  /** Free-text classification (e.g., "rust", "aws", "resilience") */
  readonly category: string;
  /** Framework label (e.g., "axum", "lambda") */
  readonly framework?: string;
  /** Projects in which the pattern was used, in document order */
  readonly projects: readonly string[];
  /** Tags, duplicates preserved */
  readonly tags: readonly string[];
}

/**
 * A parsed pattern document.
 */
export interface PatternRecord {
  readonly metadata: PatternMetadata;
  /** Body text, trimmed, without the header delimiters */
  readonly content: string;
  /** File the record was loaded from (diagnostics only) */
  readonly filePath: string;
}

/**
 * The full set of records held for the lifetime of the process.
 */
export type PatternCollection = readonly PatternRecord[];

/**
 * Build frozen metadata from a validated header.
 */
export function toPatternMetadata(header: PatternHeader): PatternMetadata {
  return Object.freeze({
    pattern: header.pattern,
    category: header.category,
    ...(header.framework != null ? { framework: header.framework } : {}),
    projects: Object.freeze([...(header.projects ?? [])]),
    tags: Object.freeze([...(header.tags ?? [])]),
  });
}

/**
 * Create an immutable PatternRecord.
 */
export function createPatternRecord(
  metadata: PatternMetadata,
  content: string,
  filePath: string
): PatternRecord {
  return Object.freeze({ metadata, content, filePath });
}

/**
 * Freeze a list of records into a collection.
 */
export function createPatternCollection(records: PatternRecord[]): PatternCollection {
  return Object.freeze([...records]);
}
