/**
 * Store module — informant collections and their files.
 */

export * from './types.js';
export * from './InformantCollection.js';
export * from './CollectionPersistence.js';
