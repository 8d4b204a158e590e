/**
 * Shared type definitions.
 */

export type { ValidationError, ValidationResult } from './common.js';
