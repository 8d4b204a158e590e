/**
 * Types for informants.
 *
 * An informant is a named, typed record describing a data artifact or an
 * abstract entity, together with its provenance: the informants it was
 * derived from (by name) and the algorithm and parameters that produced it.
 * Type-specific values live in `fields`, composed from the capabilities of
 * the informant's type.
 */

/**
 * A provenance-tracked record.
 */
export interface Informant {
  /** Identifier, unique within a collection */
  name: string;
  description: string;
  /** Tags, without duplicates */
  tags: string[];
  /** Names of the informants this one was derived from, in declaration order */
  referenceNames: string[];
  /** Name of the informant's type */
  typeName: string;
  /** Distance of the type from the root type */
  sourceDepth: number;
  /** Algorithm informant that produced this one */
  algorithm: Informant | null;
  /** Parameter values fed to the algorithm; values may be informants */
  algorithmicParameters: Record<string, unknown> | null;
  /** Shell command that constructs the informant's data */
  constructorCommand: string;
  /** Type-specific attributes; a key is present iff the attribute is */
  fields: Record<string, unknown>;
}

/**
 * Core attribute names. These are present on every informant.
 */
export const CORE_ATTRIBUTES = [
  'name',
  'description',
  'tags',
  'referenceNames',
  'typeName',
  'sourceDepth',
  'algorithm',
  'algorithmicParameters',
  'constructorCommand',
] as const;

export type CoreAttribute = typeof CORE_ATTRIBUTES[number];

/**
 * Attributes accepted when constructing an informant.
 */
export interface InformantAttributes {
  name?: string;
  description?: string;
  tags?: string[];
  referenceNames?: string[];
  algorithm?: Informant | null;
  algorithmicParameters?: Record<string, unknown> | null;
  constructorCommand?: string;
  /** Type-specific and extra attributes */
  fields?: Record<string, unknown>;
  /** Protected: only applied with `overwrite` */
  typeName?: string;
  /** Protected: only applied with `overwrite` */
  sourceDepth?: number;
}

/**
 * Anything that can resolve an informant by name.
 */
export interface InformantLookup {
  lookup(name: string): Informant | null;
}

/**
 * Result of resolving one attribute on an informant.
 */
export type AttributeResolution =
  | { present: true; value: unknown }
  | { present: false };
