/**
 * Tests for TypeGraphBuilder.
 */

import { describe, it, expect } from 'vitest';
import { buildTypeGraph, manifestInstantiator, nearestSinks } from './TypeGraphBuilder.js';
import { TypeRegistry } from './TypeRegistry.js';
import { TypeNotConstructibleError } from '../core/errors.js';
import type { TypeGraph, TypeManifest } from './types.js';

const tree: TypeManifest = {
  Root: { parents: [], sourceDepth: 0 },
  A: { parents: ['Root'], sourceDepth: null },
  B: { parents: ['A'], sourceDepth: null },
  C: { parents: ['A'], sourceDepth: null },
};

function node(graph: TypeGraph, name: string) {
  const found = graph.nodes.get(name);
  if (found === undefined) {
    throw new Error(`missing node ${name}`);
  }
  return found;
}

describe('buildTypeGraph', () => {
  it('computes source and sink depths for a small tree', () => {
    const graph = buildTypeGraph(tree, new TypeRegistry('Root'));

    expect([...graph.nodes.keys()]).toEqual(['Root', 'A', 'B', 'C']);
    expect(node(graph, 'A').sourceDepth).toBe(1);
    expect(node(graph, 'B').sourceDepth).toBe(2);

    expect(node(graph, 'B').isSink).toBe(true);
    expect(node(graph, 'B').sinkDepth).toBe(0);
    expect(node(graph, 'A').sinkDepth).toBe(1);
    expect([...node(graph, 'A').nearestSinkChildren]).toEqual(['B', 'C']);
    expect(node(graph, 'Root').sinkDepth).toBe(2);
    expect([...node(graph, 'Root').nearestSinkChildren]).toEqual(['A']);
  });

  it('wires parents and children in both directions', () => {
    const graph = buildTypeGraph(tree, new TypeRegistry('Root'));

    expect([...node(graph, 'A').directChildren]).toEqual(['B', 'C']);
    expect([...node(graph, 'C').directParents]).toEqual(['A']);
    expect(node(graph, 'Root').isSink).toBe(false);
  });

  it('keeps only the shallowest branches as nearest-sink children', () => {
    const graph = buildTypeGraph(
      {
        Leaf: { parents: ['Root'], sourceDepth: null },
        Mid: { parents: ['Root'], sourceDepth: null },
        Deep: { parents: ['Mid'], sourceDepth: null },
      },
      new TypeRegistry('Root')
    );

    expect(node(graph, 'Root').sinkDepth).toBe(1);
    expect([...node(graph, 'Root').nearestSinkChildren]).toEqual(['Leaf']);
  });

  it('places a type with several parents below the deepest one', () => {
    const graph = buildTypeGraph(
      { ...tree, D: { parents: ['B', 'Root'], sourceDepth: null } },
      new TypeRegistry('Root')
    );

    expect(node(graph, 'D').sourceDepth).toBe(3);
    expect([...node(graph, 'D').directParents]).toEqual(['B', 'Root']);
    expect(node(graph, 'Root').sinkDepth).toBe(1);
    expect([...node(graph, 'Root').nearestSinkChildren]).toEqual(['D']);
  });

  it('satisfies the sink depth rule on every node', () => {
    const graph = buildTypeGraph(
      { ...tree, D: { parents: ['B', 'C'], sourceDepth: null }, E: { parents: ['D'], sourceDepth: null } },
      new TypeRegistry('Root')
    );

    for (const current of graph.nodes.values()) {
      if (current.isSink) {
        expect(current.sinkDepth).toBe(0);
        continue;
      }
      const childDepths = [...current.directChildren].map(name => node(graph, name).sinkDepth);
      expect(current.sinkDepth).toBe(1 + Math.min(...childDepths));
    }
  });

  it('adds the root even when the manifest omits it', () => {
    const graph = buildTypeGraph({ A: { parents: ['Root'], sourceDepth: null } }, new TypeRegistry('Root'));

    expect(node(graph, 'Root').sourceDepth).toBe(0);
    expect([...node(graph, 'Root').directChildren]).toEqual(['A']);
  });

  it('uses declared depths', () => {
    const graph = buildTypeGraph(
      { A: { parents: ['Root'], sourceDepth: 4 } },
      new TypeRegistry('Root')
    );

    expect(node(graph, 'A').sourceDepth).toBe(4);
  });

  it('reuses registered depths in dynamic depth mode', () => {
    const registry = new TypeRegistry('Root');
    registry.register('A', 5);

    const graph = buildTypeGraph(tree, registry);

    expect(node(graph, 'A').sourceDepth).toBe(5);
  });

  it('recomputes depths when dynamic depth mode is off', () => {
    const registry = new TypeRegistry('Root');
    registry.register('A', 5);

    const graph = buildTypeGraph(tree, registry, { dynamicDepthMode: false });

    expect(node(graph, 'A').sourceDepth).toBe(1);
    expect(registry.get('A')).toBe(5);
  });

  it('records computed depths in the registry', () => {
    const registry = new TypeRegistry('Root');
    buildTypeGraph(tree, registry);

    expect(registry.toJSON()).toEqual({ Root: 0, A: 1, B: 2, C: 2 });
  });

  it('rejects a parent that is not declared', () => {
    const build = () => buildTypeGraph(
      { A: { parents: ['Ghost'], sourceDepth: 1 } },
      new TypeRegistry('Root')
    );

    expect(build).toThrow(TypeNotConstructibleError);
    expect(build).toThrow("Type 'A' is not constructible: parent type 'Ghost' is not declared");
  });

  it('rejects inheritance cycles', () => {
    const build = () => buildTypeGraph(
      {
        X: { parents: ['Y'], sourceDepth: null },
        Y: { parents: ['X'], sourceDepth: null },
      },
      new TypeRegistry('Root')
    );

    expect(build).toThrow("Type 'X' is not constructible: inheritance cycle X -> Y -> X");
  });

  it('wraps failures of a custom instantiator', () => {
    const build = () => buildTypeGraph(tree, new TypeRegistry('Root'), {
      instantiate: typeName => {
        throw new Error(`cannot build ${typeName}`);
      },
    });

    expect(build).toThrow("Type 'A' is not constructible: cannot build A");
  });
});

describe('manifestInstantiator', () => {
  it('gives parentless types depth 0', () => {
    const instantiate = manifestInstantiator({ Orphan: { parents: [], sourceDepth: null } }, new TypeRegistry('Root'));

    expect(instantiate('Orphan')).toEqual({ sourceDepth: 0 });
  });

  it('rejects types missing from the manifest', () => {
    const instantiate = manifestInstantiator({}, new TypeRegistry('Root'));

    expect(() => instantiate('Ghost')).toThrow("Type 'Ghost' is not constructible: type is not declared");
  });
});

describe('nearestSinks', () => {
  it('follows nearest-sink children down to sinks', () => {
    const graph = buildTypeGraph(tree, new TypeRegistry('Root'));

    expect(nearestSinks(graph, 'Root')).toEqual(['B', 'C']);
    expect(nearestSinks(graph, 'B')).toEqual(['B']);
    expect(nearestSinks(graph, 'Unknown')).toEqual([]);
  });
});
