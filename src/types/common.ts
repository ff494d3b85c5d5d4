/**
 * Common type definitions for the pattern library.
 *
 * These types are shared building blocks. They MUST NOT contain
 * pattern-specific rules.
 */

/**
 * Validation error for a single input field.
 */
export interface ValidationError {
  /** Name of the input field that failed (e.g., "pattern_name") */
  path: string;
  /** Error message */
  message: string;
  /** Rule that failed (e.g., "length", "pattern") */
  keyword: string;
}

/**
 * Result of validating user input.
 */
export interface ValidationResult {
  /** Whether validation passed */
  valid: boolean;
  /** List of validation errors (empty if valid) */
  errors: ValidationError[];
}
