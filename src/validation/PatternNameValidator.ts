/**
 * PatternNameValidator: Rules for names of new patterns.
 *
 * The name becomes a file name, so these rules are the only guard against
 * path traversal on create.
 */

import type { ValidationError, ValidationResult } from '../types/common.js';

export const PATTERN_NAME_MIN_LENGTH = 1;
export const PATTERN_NAME_MAX_LENGTH = 100;

/**
 * Letters and numbers from any script, dash and underscore.
 */
const PATTERN_NAME_CHARS = /^[\p{Alphabetic}\p{N}_-]*$/u;

const FIELD = 'pattern_name';

/**
 * Validate a proposed pattern name. Every failing rule is reported.
 */
export function validatePatternName(name: string): ValidationResult {
  const errors: ValidationError[] = [];

  // Length counts code points, not UTF-16 units
  const length = Array.from(name).length;
  if (length < PATTERN_NAME_MIN_LENGTH || length > PATTERN_NAME_MAX_LENGTH) {
    errors.push({
      path: FIELD,
      message: `Pattern name must be ${PATTERN_NAME_MIN_LENGTH}-${PATTERN_NAME_MAX_LENGTH} characters`,
      keyword: 'length',
    });
  }

  if (!PATTERN_NAME_CHARS.test(name)) {
    errors.push({
      path: FIELD,
      message: 'Pattern name can only contain alphanumeric, dash and underscore characters',
      keyword: 'pattern',
    });
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Validate the category of a new pattern. The loader rejects documents with
 * an empty category, so one is never written.
 */
export function validatePatternCategory(category: string): ValidationResult {
  if (category.length > 0) {
    return { valid: true, errors: [] };
  }
  return {
    valid: false,
    errors: [{ path: 'category', message: 'Pattern category must not be empty', keyword: 'minLength' }],
  };
}

/**
 * Join validation messages for display.
 */
export function formatValidationErrors(result: ValidationResult): string {
  return result.errors.map(e => e.message).join('; ');
}
