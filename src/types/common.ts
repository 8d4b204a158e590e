/**
 * Common type definitions shared across modules.
 */

/**
 * Validation error with JSON pointer path.
 */
export interface ValidationError {
  /** JSON pointer path to the error location (e.g., "/columns") */
  path: string;
  message: string;
  /** Schema keyword that failed (e.g., "required", "type", "enum") */
  keyword: string;
  /** Additional parameters from the validation */
  params?: Record<string, unknown>;
}

/**
 * Result of structural validation via Ajv.
 */
export interface ValidationResult {
  valid: boolean;
  /** Empty if valid */
  errors: ValidationError[];
}
