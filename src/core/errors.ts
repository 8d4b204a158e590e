/**
 * Error taxonomy for informant-ontology.
 *
 * Build-time errors (TypeNotConstructibleError, OntologyLoadError) are fatal
 * to the operation that raised them. Per-row errors (dangling references,
 * reference cycles, expression evaluation failures, duplicate names) are
 * recovered where they occur and only reported.
 */

import type { ValidationError } from '../types/common.js';

/**
 * A type could not be instantiated as a representative instance.
 */
export class TypeNotConstructibleError extends Error {
  constructor(
    public readonly typeName: string,
    public readonly reason: string
  ) {
    super(`Type '${typeName}' is not constructible: ${reason}`);
    this.name = 'TypeNotConstructibleError';
  }
}

/**
 * An ontology document could not be read or is malformed.
 */
export class OntologyLoadError extends Error {
  constructor(
    public readonly path: string,
    public readonly reason: string
  ) {
    super(`Failed to load ontology '${path}': ${reason}`);
    this.name = 'OntologyLoadError';
  }
}

/**
 * Informant fields do not satisfy the composed schema of their type.
 */
export class InformantValidationError extends Error {
  constructor(
    public readonly typeName: string,
    public readonly errors: ValidationError[]
  ) {
    const summary = errors.map(e => `${e.path} ${e.message}`).join('; ');
    super(`Invalid fields for type '${typeName}': ${summary}`);
    this.name = 'InformantValidationError';
  }
}

/**
 * A reference name has no informant in the lookup collection.
 */
export class DanglingReferenceError extends Error {
  constructor(
    public readonly referenceName: string,
    public readonly referencedBy: string
  ) {
    super(`Reference '${referenceName}' from '${referencedBy}' does not resolve`);
    this.name = 'DanglingReferenceError';
  }
}

/**
 * A reference walk reached an informant already on its own path.
 */
export class CycleDetectedError extends Error {
  constructor(public readonly path: string[]) {
    super(`Reference cycle detected: ${path.join(' -> ')}`);
    this.name = 'CycleDetectedError';
  }
}

/**
 * A predicate expression could not be parsed.
 */
export class ExpressionSyntaxError extends Error {
  constructor(
    public readonly expression: string,
    public readonly position: number,
    detail: string
  ) {
    super(`Syntax error at position ${position} in '${expression}': ${detail}`);
    this.name = 'ExpressionSyntaxError';
  }
}

/**
 * A parsed predicate failed while being evaluated against one informant.
 */
export class ExpressionEvaluationError extends Error {
  constructor(public readonly reason: string) {
    super(reason);
    this.name = 'ExpressionEvaluationError';
  }
}

/**
 * An append collided with an existing name and neither replace nor
 * duplicates were allowed.
 */
export class DuplicateNameError extends Error {
  constructor(public readonly informantName: string) {
    super(`Informant '${informantName}' is already stored; row left unchanged`);
    this.name = 'DuplicateNameError';
  }
}

/**
 * A persisted collection file holds a line that is not a row or an informant.
 */
export class CollectionFormatError extends Error {
  constructor(
    public readonly path: string,
    public readonly line: number,
    public readonly reason: string
  ) {
    super(`Malformed collection file '${path}' at line ${line}: ${reason}`);
    this.name = 'CollectionFormatError';
  }
}

/**
 * No informant with the requested name exists in a collection.
 */
export class NotFoundError extends Error {
  constructor(public readonly informantName: string) {
    super(`Informant '${informantName}' not found`);
    this.name = 'NotFoundError';
  }
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
