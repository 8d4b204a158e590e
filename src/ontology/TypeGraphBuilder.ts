/**
 * TypeGraphBuilder — Builds the type DAG and its depth metrics.
 *
 * Three passes over a type manifest:
 * 1. Source depth for every type: the registered depth (dynamic depth
 *    mode), else the depth declared in the manifest, else the depth observed
 *    on a representative instance. New depths are cached in the registry.
 * 2. Parent -> child wiring from each type's direct parents.
 * 3. Sink depth: nodes are visited in descending source depth (equal depths
 *    keep declaration order) and every node with children takes
 *    1 + the minimum sink depth of its children; all children attaining the
 *    minimum are kept as nearest-sink children.
 *
 * Pass 3 relies on children never being shallower than their parents. A
 * hierarchy whose declared depths break that rule gets wrong sink depths;
 * the ordering is kept as is and not replaced by a topological sort.
 */

import { TypeNotConstructibleError, errorMessage } from '../core/errors.js';
import { moduleLogger, type Logger } from '../logging/logger.js';
import type { TypeRegistry } from './TypeRegistry.js';
import type { TypeGraph, TypeManifest, TypeNode } from './types.js';

/**
 * Observes the source depth of a representative instance of a type.
 */
export type RepresentativeInstantiator = (typeName: string) => { sourceDepth: number };

export interface BuildTypeGraphOptions {
  /** Reuse registered depths (default: true) */
  dynamicDepthMode?: boolean;
  /** Representative construction (default: depth computed from the manifest) */
  instantiate?: RepresentativeInstantiator;
  logger?: Logger;
}

interface MutableTypeNode {
  typeName: string;
  directParents: Set<string>;
  directChildren: Set<string>;
  isSink: boolean;
  sourceDepth: number;
  sinkDepth: number;
  nearestSinkChildren: Set<string>;
}

/**
 * Representative instantiation driven by the manifest alone:
 * 1 + the deepest parent, memoized in the registry. Parentless types sit at 0.
 */
export function manifestInstantiator(
  manifest: TypeManifest,
  registry: TypeRegistry,
  dynamicDepthMode = true
): RepresentativeInstantiator {
  const depthOf = (typeName: string, path: string[]): number => {
    if (typeName === registry.rootType) {
      return 0;
    }
    const registered = registry.get(typeName);
    if (dynamicDepthMode && registered !== undefined) {
      return registered;
    }
    if (path.includes(typeName)) {
      throw new TypeNotConstructibleError(typeName, `inheritance cycle ${[...path, typeName].join(' -> ')}`);
    }
    const entry = manifest[typeName];
    if (entry === undefined) {
      throw new TypeNotConstructibleError(typeName, 'type is not declared');
    }
    if (entry.sourceDepth !== null) {
      registry.register(typeName, entry.sourceDepth);
      return entry.sourceDepth;
    }
    const parentDepths = entry.parents.map(parent => depthOf(parent, [...path, typeName]));
    const depth = parentDepths.length === 0 ? 0 : 1 + Math.max(...parentDepths);
    registry.register(typeName, depth);
    return depth;
  };

  return (typeName: string) => ({ sourceDepth: depthOf(typeName, []) });
}

/**
 * Build the type graph for a manifest.
 *
 * @throws TypeNotConstructibleError when a type references an undeclared
 *   parent or its representative cannot be built
 */
export function buildTypeGraph(
  manifest: TypeManifest,
  registry: TypeRegistry,
  options: BuildTypeGraphOptions = {}
): TypeGraph {
  const log = moduleLogger('TypeGraphBuilder', options.logger);
  const dynamicDepthMode = options.dynamicDepthMode ?? true;
  const instantiate = options.instantiate ?? manifestInstantiator(manifest, registry, dynamicDepthMode);
  const rootType = registry.rootType;

  const typeNames = [rootType, ...Object.keys(manifest).filter(name => name !== rootType)];
  const nodes = new Map<string, MutableTypeNode>();

  // Pass 1: source depths
  for (const typeName of typeNames) {
    const declared = manifest[typeName]?.sourceDepth ?? null;
    const registered = registry.get(typeName);
    let sourceDepth: number;

    if (typeName === rootType) {
      sourceDepth = registered ?? 0;
    } else if (dynamicDepthMode && registered !== undefined) {
      sourceDepth = registered;
    } else if (declared !== null) {
      sourceDepth = declared;
    } else {
      try {
        sourceDepth = instantiate(typeName).sourceDepth;
      } catch (err) {
        if (err instanceof TypeNotConstructibleError) {
          throw err;
        }
        throw new TypeNotConstructibleError(typeName, errorMessage(err));
      }
    }
    registry.register(typeName, sourceDepth);

    nodes.set(typeName, {
      typeName,
      directParents: new Set(),
      directChildren: new Set(),
      isSink: true,
      sourceDepth,
      sinkDepth: 0,
      nearestSinkChildren: new Set(),
    });
  }

  // Pass 2: parent -> child edges
  for (const typeName of typeNames) {
    const node = nodes.get(typeName);
    if (node === undefined) {
      continue;
    }
    for (const parentName of manifest[typeName]?.parents ?? []) {
      const parent = nodes.get(parentName);
      if (parent === undefined) {
        throw new TypeNotConstructibleError(typeName, `parent type '${parentName}' is not declared`);
      }
      parent.directChildren.add(typeName);
      parent.isSink = false;
      node.directParents.add(parentName);
    }
  }

  // Pass 3: sink depths, deepest source depth first
  const order = [...nodes.values()]
    .map((node, index) => ({ node, index }))
    .sort((a, b) => b.node.sourceDepth - a.node.sourceDepth || a.index - b.index)
    .map(entry => entry.node);

  for (const node of order) {
    if (node.directChildren.size === 0) {
      continue;
    }
    const children = [...node.directChildren].flatMap(name => {
      const child = nodes.get(name);
      return child !== undefined ? [child] : [];
    });
    const minSinkDepth = Math.min(...children.map(child => child.sinkDepth));
    node.sinkDepth = 1 + minSinkDepth;
    node.nearestSinkChildren = new Set(
      children.filter(child => child.sinkDepth === minSinkDepth).map(child => child.typeName)
    );
  }

  log.debug({ types: nodes.size, rootType }, 'Built type graph');

  const frozen = new Map<string, TypeNode>();
  for (const [name, node] of nodes) {
    frozen.set(name, Object.freeze({ ...node }));
  }
  return { rootType, nodes: frozen };
}

/**
 * Sink types reached from a type by following nearest-sink children.
 * A sink returns itself.
 */
export function nearestSinks(graph: TypeGraph, typeName: string): string[] {
  const sinks: string[] = [];
  const seen = new Set<string>();
  const stack = [typeName];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || seen.has(current)) {
      continue;
    }
    seen.add(current);
    const node = graph.nodes.get(current);
    if (node === undefined) {
      continue;
    }
    if (node.isSink) {
      sinks.push(current);
    } else {
      stack.push(...[...node.nearestSinkChildren].reverse());
    }
  }

  return sinks;
}
