/**
 * Types for the Pattern Store.
 *
 * The Pattern Store orchestrates:
 * - the immutable in-memory collection (read path)
 * - name validation and file writes (write path)
 *
 * The two paths are independent: writes never touch the collection.
 */

import type { ValidationResult } from '../types/common.js';
import type { PatternCollection, PatternRecord } from '../types/PatternRecord.js';

// Re-export for convenience
export type { PatternCollection, PatternRecord };

/**
 * Criteria for searching patterns. Omitted criteria do not constrain the result.
 */
export interface PatternSearchFilter {
  /** Case-insensitive text matched against name and content */
  query?: string;
  /** Exact category */
  category?: string;
  /** Exact framework */
  framework?: string;
  /** Exact tag that must be present */
  tag?: string;
}

/**
 * One line of the pattern listing.
 */
export interface PatternSummary {
  name: string;
  category: string;
}

/**
 * A search hit: the pattern name and the start of its content.
 */
export interface PatternMatch {
  name: string;
  excerpt: string;
}

/**
 * Fields of a pattern to be written to disk.
 */
export interface NewPatternInput {
  name: string;
  category: string;
  framework: string;
  projects?: readonly string[];
  tags: readonly string[];
  content: string;
}

/**
 * Result of creating a pattern.
 */
export type CreatePatternResult =
  | {
      success: true;
      /** Absolute path of the written document */
      filePath: string;
    }
  | {
      success: false;
      reason: 'invalid-name' | 'invalid-category';
      validation: ValidationResult;
      error: string;
    }
  | {
      success: false;
      reason: 'write-failed';
      error: string;
    };

/**
 * Entry recorded for each file the loader skipped.
 */
export interface PatternLoadError {
  path: string;
  error: string;
}

/**
 * Result of loading a patterns directory.
 */
export interface PatternLoadResult {
  patterns: PatternCollection;
  errors: PatternLoadError[];
}

/**
 * Configuration for PatternStore.
 */
export interface PatternStoreConfig {
  /** Absolute path of the patterns directory */
  patternsDir: string;
}
