/**
 * Types for the ontology module.
 *
 * A type is a named schema: the capabilities it includes, its own extra
 * fields, and an explicit list of the types it extends. Multiple parents are
 * allowed; the resulting "is-a" relation is a DAG rooted at the root type.
 */

/**
 * JSON Schema fragment describing one field value.
 */
export type FieldSchema = Record<string, unknown>;

/**
 * Definition of one type-specific field.
 */
export interface FieldDefinition {
  /** JSON Schema fragment the value must satisfy */
  schema?: FieldSchema;
  /** Value used when the field is not supplied (default: null) */
  default?: unknown;
  /** Whether a value must be supplied (a default also satisfies this) */
  required?: boolean;
  /** Human-readable description */
  description?: string;
}

/**
 * A reusable bundle of fields a type may include.
 */
export interface CapabilityDefinition {
  name: string;
  description?: string;
  fields: Record<string, FieldDefinition>;
}

/**
 * A declared type.
 */
export interface TypeDefinition {
  name: string;
  description?: string;
  /** Direct supertypes, in declaration order */
  extends: string[];
  /** Capabilities included, in declaration order */
  capabilities: string[];
  /** Own fields beyond those of the capabilities */
  fields: Record<string, FieldDefinition>;
  /** Source depth, when the declaring document fixes it */
  sourceDepth?: number;
}

/**
 * One entry of a lightweight type manifest.
 */
export interface TypeManifestEntry {
  parents: string[];
  sourceDepth: number | null;
}

/**
 * Lightweight manifest of declared types, keyed by type name in
 * declaration order. This is all the type graph builder needs.
 */
export type TypeManifest = Record<string, TypeManifestEntry>;

/**
 * Type name -> the type followed by all its ancestors.
 * Plain data so it can be sent to worker processes.
 */
export type TypeLineage = Record<string, string[]>;

/**
 * One node of the type graph.
 */
export interface TypeNode {
  typeName: string;
  directParents: ReadonlySet<string>;
  directChildren: ReadonlySet<string>;
  isSink: boolean;
  sourceDepth: number;
  sinkDepth: number;
  nearestSinkChildren: ReadonlySet<string>;
}

/**
 * The type graph produced by a build.
 */
export interface TypeGraph {
  rootType: string;
  /** Nodes keyed by type name, root first, then declaration order */
  nodes: ReadonlyMap<string, TypeNode>;
}

/**
 * Tabular form of one type graph node, as written by the build command.
 */
export interface TypeGraphRow {
  typeName: string;
  directParents: string[];
  directChildren: string[];
  isSink: boolean;
  sourceDepth: number;
  sinkDepth: number;
  toNearestSink: string[];
}

/**
 * Default name of the universal root type.
 */
export const DEFAULT_ROOT_TYPE = 'Informant';
