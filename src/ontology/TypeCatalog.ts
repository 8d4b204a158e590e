/**
 * TypeCatalog — Declared types, their capabilities, and their lineage.
 *
 * This module handles:
 * - Indexing type definitions and capabilities by name
 * - Resolving lineage (a type followed by all of its ancestors)
 * - Composing the field set of a type from capabilities and parents
 * - Producing the lightweight manifest consumed by the graph builder
 *
 * The root type is implicit and always present.
 */

import { BUILTIN_CAPABILITIES } from './capabilities.js';
import type {
  CapabilityDefinition,
  FieldDefinition,
  FieldSchema,
  TypeDefinition,
  TypeLineage,
  TypeManifest,
} from './types.js';
import { DEFAULT_ROOT_TYPE } from './types.js';

export interface TypeCatalogOptions {
  /** Name of the universal root type (default: 'Informant') */
  rootType?: string;
  /** Capabilities declared in addition to the built-in ones */
  capabilities?: CapabilityDefinition[];
}

/**
 * Composed JSON Schema of a type's fields.
 */
export type ComposedTypeSchema = {
  type: 'object';
  properties: Record<string, FieldSchema>;
  required: string[];
};

export class TypeCatalog {
  readonly rootType: string;
  private readonly types: Map<string, TypeDefinition> = new Map();
  private readonly capabilities: Map<string, CapabilityDefinition> = new Map();

  constructor(definitions: TypeDefinition[], options: TypeCatalogOptions = {}) {
    this.rootType = options.rootType ?? DEFAULT_ROOT_TYPE;

    for (const capability of [...BUILTIN_CAPABILITIES, ...(options.capabilities ?? [])]) {
      if (this.capabilities.has(capability.name)) {
        throw new Error(`Duplicate capability: ${capability.name}`);
      }
      this.capabilities.set(capability.name, capability);
    }

    this.types.set(this.rootType, {
      name: this.rootType,
      description: 'Universal root type',
      extends: [],
      capabilities: [],
      fields: {},
      sourceDepth: 0,
    });

    for (const definition of definitions) {
      if (this.types.has(definition.name)) {
        throw new Error(`Duplicate type: ${definition.name}`);
      }
      for (const capabilityName of definition.capabilities) {
        if (!this.capabilities.has(capabilityName)) {
          throw new Error(`Type '${definition.name}' includes unknown capability '${capabilityName}'`);
        }
      }
      this.types.set(definition.name, definition);
    }
  }

  get(typeName: string): TypeDefinition | undefined {
    return this.types.get(typeName);
  }

  has(typeName: string): boolean {
    return this.types.has(typeName);
  }

  getCapability(name: string): CapabilityDefinition | undefined {
    return this.capabilities.get(name);
  }

  /**
   * All type names, root first, then declaration order.
   */
  names(): string[] {
    return [...this.types.keys()];
  }

  get size(): number {
    return this.types.size;
  }

  /**
   * Direct supertypes of a type (empty for unknown types).
   */
  parentsOf(typeName: string): string[] {
    return [...(this.types.get(typeName)?.extends ?? [])];
  }

  /**
   * The type followed by its ancestors, breadth-first, each listed once.
   * Undeclared ancestors are listed but not expanded.
   */
  lineage(typeName: string): string[] {
    const result: string[] = [];
    const seen = new Set<string>();
    const queue: string[] = [typeName];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || seen.has(current)) {
        continue;
      }
      seen.add(current);
      result.push(current);
      queue.push(...this.parentsOf(current));
    }

    return result;
  }

  isSubtypeOf(typeName: string, ancestor: string): boolean {
    return this.lineage(typeName).includes(ancestor);
  }

  /**
   * Full field set of a type. The most general ancestors contribute first,
   * so a type's own declarations override inherited ones.
   */
  fieldsOf(typeName: string): Record<string, FieldDefinition> {
    const fields: Record<string, FieldDefinition> = {};

    for (const name of this.lineage(typeName).reverse()) {
      const definition = this.types.get(name);
      if (definition === undefined) {
        continue;
      }
      for (const capabilityName of definition.capabilities) {
        const capability = this.capabilities.get(capabilityName);
        if (capability !== undefined) {
          Object.assign(fields, capability.fields);
        }
      }
      Object.assign(fields, definition.fields);
    }

    return fields;
  }

  /**
   * Field names of `typeName` that `other` does not have.
   * `other` defaults to the first direct parent; the root has no distinct fields.
   */
  distinctFields(typeName: string, other?: string): string[] {
    if (typeName === this.rootType) {
      return [];
    }
    const compareWith = other ?? this.parentsOf(typeName)[0];
    const inherited = compareWith !== undefined ? this.fieldsOf(compareWith) : {};
    return Object.keys(this.fieldsOf(typeName)).filter(name => !Object.hasOwn(inherited, name));
  }

  /**
   * For each entry of a type's lineage, the fields that entry introduces.
   */
  inheritedFieldTable(typeName: string): Record<string, string[]> {
    const table: Record<string, string[]> = {};
    for (const name of this.lineage(typeName)) {
      table[name] = this.distinctFields(name);
    }
    return table;
  }

  /**
   * JSON Schema for the fields of a type.
   */
  composedSchema(typeName: string): ComposedTypeSchema {
    const properties: Record<string, FieldSchema> = {};
    const required: string[] = [];

    for (const [name, field] of Object.entries(this.fieldsOf(typeName))) {
      properties[name] = field.schema ?? {};
      if (field.required === true) {
        required.push(name);
      }
    }

    return { type: 'object', properties, required };
  }

  /**
   * Lightweight manifest for the type graph builder.
   */
  toManifest(): TypeManifest {
    const manifest: TypeManifest = {};
    for (const definition of this.types.values()) {
      manifest[definition.name] = {
        parents: [...definition.extends],
        sourceDepth: definition.sourceDepth ?? null,
      };
    }
    return manifest;
  }

  lineageTable(): TypeLineage {
    const table: TypeLineage = {};
    for (const name of this.types.keys()) {
      table[name] = this.lineage(name);
    }
    return table;
  }
}

/**
 * Create a catalog from type definitions.
 */
export function createTypeCatalog(
  definitions: TypeDefinition[],
  options?: TypeCatalogOptions
): TypeCatalog {
  return new TypeCatalog(definitions, options);
}
