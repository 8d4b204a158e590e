/**
 * Tag operations. Informants are treated as values: both functions return
 * a new informant and leave the input untouched.
 */

import type { Informant } from './types.js';

export function addTag(informant: Informant, tag: string): Informant {
  if (informant.tags.includes(tag)) {
    return { ...informant, tags: [...informant.tags] };
  }
  return { ...informant, tags: [...informant.tags, tag] };
}

export function removeTag(informant: Informant, tag: string): Informant {
  return { ...informant, tags: informant.tags.filter(t => t !== tag) };
}
