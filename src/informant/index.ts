/**
 * Informant module — record model, construction, and reference reduction.
 */

export * from './types.js';
export * from './attributes.js';
export * from './schema.js';
export * from './tags.js';
export * from './location.js';
export * from './InformantValidator.js';
export * from './InformantFactory.js';
export * from './ReferenceReducer.js';
