/**
 * InformantValidator — Structural validation of informant fields using Ajv.
 *
 * Each type's composed field schema is compiled once, on first use, and
 * cached by type name. Ajv is configured once at construction time.
 */

import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';
import ajvFormats from 'ajv-formats';
import type { ValidationError, ValidationResult } from '../types/common.js';
import type { ComposedTypeSchema } from '../ontology/TypeCatalog.js';

export interface InformantValidatorOptions {
  /** Ajv strict mode (default: true) */
  strict?: boolean;
  /** Register the ajv-formats string formats (default: true) */
  addFormats?: boolean;
}

const addFormats = ajvFormats.default;

/**
 * Convert an Ajv ErrorObject to our ValidationError format.
 */
function convertAjvError(error: ErrorObject): ValidationError {
  const path = error.instancePath || '/';
  let message = error.message ?? 'Validation failed';

  switch (error.keyword) {
    case 'required':
      if ('missingProperty' in error.params) {
        message = `Missing required field: ${String(error.params.missingProperty)}`;
      }
      break;
    case 'type':
      if ('type' in error.params) {
        message = `Expected type: ${String(error.params.type)}`;
      }
      break;
    case 'enum':
      if ('allowedValues' in error.params && Array.isArray(error.params.allowedValues)) {
        message = `Must be one of: ${error.params.allowedValues.join(', ')}`;
      }
      break;
  }

  return {
    path,
    message,
    keyword: error.keyword,
    params: { ...error.params },
  };
}

export class InformantValidator {
  private readonly ajv: Ajv;
  private readonly compiled: Map<string, ValidateFunction> = new Map();

  constructor(options: InformantValidatorOptions = {}) {
    this.ajv = new Ajv({
      strict: options.strict ?? true,
      allowUnionTypes: true,
      allErrors: true,
    });
    if (options.addFormats ?? true) {
      addFormats(this.ajv);
    }
  }

  /**
   * Validate the fields of an informant of `typeName` against the type's
   * composed schema. A schema that fails to compile is reported as a
   * single 'schema' error.
   */
  validate(typeName: string, fields: Record<string, unknown>, schema: ComposedTypeSchema): ValidationResult {
    let validateFn = this.compiled.get(typeName);

    if (validateFn === undefined) {
      try {
        validateFn = this.ajv.compile(schema);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return {
          valid: false,
          errors: [{ path: '/', message: `Schema error: ${message}`, keyword: 'schema' }],
        };
      }
      this.compiled.set(typeName, validateFn);
    }

    if (validateFn(fields)) {
      return { valid: true, errors: [] };
    }
    return { valid: false, errors: (validateFn.errors ?? []).map(convertAjvError) };
  }
}
