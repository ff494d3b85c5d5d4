/**
 * PatternStore: Read and write operations on the pattern library.
 *
 * Reads go against the collection loaded at startup, which is frozen and
 * shared by every request. Creates validate the name and category, then
 * write straight to the patterns directory without updating the collection.
 */

import { findPatternByName, listPatterns, searchPatterns } from './PatternQuery.js';
import { writePattern } from './PatternWriter.js';
import {
  formatValidationErrors,
  validatePatternCategory,
  validatePatternName,
} from '../validation/PatternNameValidator.js';
import type {
  CreatePatternResult,
  NewPatternInput,
  PatternCollection,
  PatternMatch,
  PatternRecord,
  PatternSearchFilter,
  PatternStoreConfig,
  PatternSummary,
} from './types.js';

export class PatternStore {
  private readonly patterns: PatternCollection;
  private readonly config: PatternStoreConfig;

  constructor(patterns: PatternCollection, config: PatternStoreConfig) {
    this.patterns = patterns;
    this.config = config;
  }

  /**
   * Number of loaded patterns.
   */
  get size(): number {
    return this.patterns.length;
  }

  /**
   * Directory new patterns are written to.
   */
  get patternsDir(): string {
    return this.config.patternsDir;
  }

  all(): PatternCollection {
    return this.patterns;
  }

  list(): PatternSummary[] {
    return listPatterns(this.patterns);
  }

  search(filter: PatternSearchFilter): PatternMatch[] {
    return searchPatterns(this.patterns, filter);
  }

  get(name: string): PatternRecord | null {
    return findPatternByName(this.patterns, name);
  }

  /**
   * Validate and write a new pattern document.
   *
   * The new pattern is not added to this store.
   */
  async create(input: NewPatternInput): Promise<CreatePatternResult> {
    const validation = validatePatternName(input.name);
    if (!validation.valid) {
      return {
        success: false,
        reason: 'invalid-name',
        validation,
        error: formatValidationErrors(validation),
      };
    }

    const categoryValidation = validatePatternCategory(input.category);
    if (!categoryValidation.valid) {
      return {
        success: false,
        reason: 'invalid-category',
        validation: categoryValidation,
        error: formatValidationErrors(categoryValidation),
      };
    }

    try {
      const filePath = await writePattern(this.config.patternsDir, input);
      return { success: true, filePath };
    } catch (err) {
      return {
        success: false,
        reason: 'write-failed',
        error: err instanceof Error ? err.message : String(err),
      };
    }
  }
}

/**
 * Create a PatternStore over an already loaded collection.
 */
export function createPatternStore(
  patterns: PatternCollection,
  config: PatternStoreConfig
): PatternStore {
  return new PatternStore(patterns, config);
}
