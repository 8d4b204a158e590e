/**
 * informant-ontology — Typed provenance records, their type graph, and
 * predicate queries over collections of them.
 *
 * This is the main entry point for the library.
 */

// Types
export * from './types/index.js';

// Errors
export * from './core/errors.js';

// Logging
export * from './logging/logger.js';

// Configuration
export * from './config/types.js';
export * from './config/loader.js';

// Type system and type graph
export * from './ontology/index.js';

// Informant model, construction, and reference reduction
export * from './informant/index.js';

// Predicate queries
export * from './query/index.js';

// Collection store
export * from './store/index.js';

// Folder harvesting
export * from './harvest/index.js';
