/**
 * TypeRegistry — Memoized source depth per type name.
 *
 * A registry is created explicitly for a process or a build run and passed
 * to whoever needs it. It starts with the root type at depth 0 and only
 * ever grows: the first depth registered for a name wins.
 */

import type { TypeGraph } from './types.js';
import { DEFAULT_ROOT_TYPE } from './types.js';

export class TypeRegistry {
  private readonly depths: Map<string, number> = new Map();

  constructor(public readonly rootType: string = DEFAULT_ROOT_TYPE) {
    this.depths.set(rootType, 0);
  }

  /**
   * Get the registered depth of a type.
   */
  get(typeName: string): number | undefined {
    return this.depths.get(typeName);
  }

  has(typeName: string): boolean {
    return this.depths.has(typeName);
  }

  get size(): number {
    return this.depths.size;
  }

  /**
   * Register a depth. Returns the depth now stored for the name, which is
   * the earlier value when the name was already registered.
   */
  register(typeName: string, depth: number): number {
    if (!Number.isInteger(depth) || depth < 0) {
      throw new RangeError(`Source depth for '${typeName}' must be a non-negative integer, got ${depth}`);
    }
    const existing = this.depths.get(typeName);
    if (existing !== undefined) {
      return existing;
    }
    this.depths.set(typeName, depth);
    return depth;
  }

  entries(): Array<[string, number]> {
    return [...this.depths.entries()];
  }

  /**
   * Register the source depths recorded in a previously built graph.
   */
  seedFromGraph(graph: TypeGraph): void {
    for (const node of graph.nodes.values()) {
      this.register(node.typeName, node.sourceDepth);
    }
  }

  toJSON(): Record<string, number> {
    return Object.fromEntries(this.depths);
  }
}

/**
 * Create a new TypeRegistry seeded with the root type.
 */
export function createTypeRegistry(rootType?: string): TypeRegistry {
  return new TypeRegistry(rootType);
}
