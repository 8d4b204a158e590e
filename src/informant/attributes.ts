/**
 * Attribute presence and resolution.
 *
 * Presence is decided by table lookup, never by probing for defaults: core
 * attributes are always present, and a type-specific attribute is present
 * exactly when it is an own key of the informant's `fields`.
 */

import type { AttributeResolution, CoreAttribute, Informant } from './types.js';
import { CORE_ATTRIBUTES } from './types.js';

const CORE_SET: ReadonlySet<string> = new Set(CORE_ATTRIBUTES);

export function isCoreAttribute(name: string): name is CoreAttribute {
  return CORE_SET.has(name);
}

export function hasAttribute(informant: Informant, name: string): boolean {
  return isCoreAttribute(name) || Object.hasOwn(informant.fields, name);
}

/**
 * Resolve an attribute by name.
 */
export function resolveAttribute(informant: Informant, name: string): AttributeResolution {
  if (isCoreAttribute(name)) {
    return { present: true, value: informant[name] };
  }
  if (Object.hasOwn(informant.fields, name)) {
    return { present: true, value: informant.fields[name] };
  }
  return { present: false };
}

/**
 * Structural check for informant-shaped values (e.g. an algorithm or a
 * parameter value that is itself an informant).
 */
export function isInformant(value: unknown): value is Informant {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  return (
    'name' in value && typeof value.name === 'string' &&
    'typeName' in value && typeof value.typeName === 'string' &&
    'referenceNames' in value && Array.isArray(value.referenceNames) &&
    'fields' in value && value.fields !== null && typeof value.fields === 'object'
  );
}
