/**
 * Ontology module exports.
 */

export * from './types.js';
export * from './capabilities.js';
export * from './TypeRegistry.js';
export * from './TypeCatalog.js';
export * from './OntologyLoader.js';
export * from './TypeGraphBuilder.js';
export * from './TypeGraphSerializer.js';
