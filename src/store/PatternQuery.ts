/**
 * PatternQuery: Read-only queries over the pattern collection.
 *
 * All functions are pure linear scans. Results keep collection order.
 */

import type { PatternCollection, PatternRecord } from '../types/PatternRecord.js';
import type { PatternMatch, PatternSearchFilter, PatternSummary } from './types.js';

/**
 * Number of content characters shown per search hit.
 */
export const EXCERPT_LENGTH = 200;

/**
 * Return the first `max` characters of `text`, counting code points so a
 * surrogate pair is never split.
 */
export function truncateChars(text: string, max: number): string {
  if (text.length <= max) {
    return text;
  }
  return Array.from(text).slice(0, max).join('');
}

/**
 * Summarize every pattern as (name, category).
 */
export function listPatterns(collection: PatternCollection): PatternSummary[] {
  return collection.map(p => ({
    name: p.metadata.pattern,
    category: p.metadata.category,
  }));
}

/**
 * Check a record against every supplied criterion.
 *
 * category, framework and tag are exact and case-sensitive; query is a
 * case-insensitive substring of "<name> <content>".
 */
export function matchesFilter(record: PatternRecord, filter: PatternSearchFilter): boolean {
  const { metadata } = record;

  if (filter.category !== undefined && metadata.category !== filter.category) {
    return false;
  }

  if (filter.framework !== undefined && metadata.framework !== filter.framework) {
    return false;
  }

  if (filter.tag !== undefined && !metadata.tags.includes(filter.tag)) {
    return false;
  }

  if (filter.query !== undefined) {
    const searchable = `${metadata.pattern} ${record.content}`.toLowerCase();
    if (!searchable.includes(filter.query.toLowerCase())) {
      return false;
    }
  }

  return true;
}

/**
 * Find all patterns matching the filter. An empty array means no matches.
 */
export function searchPatterns(
  collection: PatternCollection,
  filter: PatternSearchFilter
): PatternMatch[] {
  return collection
    .filter(p => matchesFilter(p, filter))
    .map(p => ({
      name: p.metadata.pattern,
      excerpt: truncateChars(p.content, EXCERPT_LENGTH),
    }));
}

/**
 * Find the first pattern whose name equals `name` exactly.
 */
export function findPatternByName(
  collection: PatternCollection,
  name: string
): PatternRecord | null {
  return collection.find(p => p.metadata.pattern === name) ?? null;
}
