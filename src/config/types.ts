/**
 * Configuration types for informant-ontology.
 *
 * These types define the structure of informant.config.yaml. Every setting
 * has a default; settings without a natural default are null.
 */

import type { LogLevel } from '../logging/logger.js';

/**
 * Top-level configuration.
 */
export interface AppConfig {
  ontology: OntologyConfig;
  query: QueryConfig;
  store: StoreConfig;
  logging: LoggingConfig;
}

/**
 * Type system settings.
 */
export interface OntologyConfig {
  /** Name of the universal root type (default: 'Informant') */
  rootType: string;
  /** Reuse registered source depths (default: true) */
  dynamicDepthMode: boolean;
  /** Entry ontology document */
  path: string | null;
}

/**
 * Predicate filtering settings.
 */
export interface QueryConfig {
  /** Prefix marking attribute references (default: '@') */
  escapeMarker: string;
  /** Value of clauses over missing attributes (default: false) */
  onMissing: boolean;
  /** Worker processes for parallel filtering (default: 2) */
  workers: number;
  /** Rows per chunk; null splits rows evenly across workers */
  chunkSize: number | null;
}

/**
 * Collection store settings.
 */
export interface StoreConfig {
  /** Collection file (JSON Lines) */
  path: string | null;
  /** Mark appended informants verified (default: false) */
  verifyOnAppend: boolean;
}

export interface LoggingConfig {
  /** Minimum log level (default: 'info') */
  level: LogLevel;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  ontology: {
    rootType: 'Informant',
    dynamicDepthMode: true,
    path: null,
  },
  query: {
    escapeMarker: '@',
    onMissing: false,
    workers: 2,
    chunkSize: null,
  },
  store: {
    path: null,
    verifyOnAppend: false,
  },
  logging: {
    level: 'info',
  },
};
