/**
 * Tests for ReferenceReducer.
 */

import { describe, it, expect } from 'vitest';
import { buildReferenceTree, reduceReferences } from './ReferenceReducer.js';
import { DanglingReferenceError } from '../core/errors.js';
import type { Informant, InformantLookup } from './types.js';

function informant(name: string, referenceNames: string[] = []): Informant {
  return {
    name,
    description: '',
    tags: [],
    referenceNames,
    typeName: 'Informant',
    sourceDepth: 0,
    algorithm: null,
    algorithmicParameters: null,
    constructorCommand: '',
    fields: {},
  };
}

function lookupOf(...informants: Informant[]): InformantLookup {
  return { lookup: name => informants.find(i => i.name === name) ?? null };
}

describe('reduceReferences', () => {
  it('drops a reference reachable through another one', () => {
    const lookup = lookupOf(informant('X', ['Y']), informant('Y'));

    const result = reduceReferences(informant('R', ['X', 'Y']), lookup);

    expect(result.informant.referenceNames).toEqual(['X']);
    expect(result.pruned).toEqual(['Y']);
    expect(result.cycles).toEqual([]);
    expect(result.dangling).toEqual([]);
  });

  it('follows references transitively', () => {
    const lookup = lookupOf(informant('A', ['B']), informant('B', ['C']), informant('C'));

    const result = reduceReferences(informant('R', ['A', 'B', 'C']), lookup);

    expect(result.informant.referenceNames).toEqual(['A']);
    expect(result.pruned).toEqual(['B', 'C']);
  });

  it('finds redundancy regardless of reference order', () => {
    const lookup = lookupOf(informant('Y'), informant('Z', ['X']), informant('X'));

    const result = reduceReferences(informant('R', ['X', 'Y', 'Z']), lookup);

    expect(result.informant.referenceNames).toEqual(['Y', 'Z']);
  });

  it('is idempotent', () => {
    const lookup = lookupOf(informant('X', ['Y']), informant('Y'));

    const once = reduceReferences(informant('R', ['X', 'Y']), lookup);
    const twice = reduceReferences(once.informant, lookup);

    expect(twice.informant.referenceNames).toEqual(once.informant.referenceNames);
    expect(twice.pruned).toEqual([]);
  });

  it('keeps references that are not reachable from each other', () => {
    const lookup = lookupOf(informant('X'), informant('Y'));

    expect(reduceReferences(informant('R', ['X', 'Y']), lookup).informant.referenceNames).toEqual(['X', 'Y']);
  });

  it('collapses duplicate direct references', () => {
    const lookup = lookupOf(informant('A'));

    expect(reduceReferences(informant('R', ['A', 'A']), lookup).informant.referenceNames).toEqual(['A']);
  });

  it('reports cycles without following them', () => {
    const lookup = lookupOf(informant('A', ['B']), informant('B', ['A']));

    const result = reduceReferences(informant('R', ['A']), lookup);

    expect(result.informant.referenceNames).toEqual(['A']);
    expect(result.cycles.map(c => c.path)).toEqual([['R', 'A', 'B', 'A']]);
    expect(result.cycles[0]?.message).toBe('Reference cycle detected: R -> A -> B -> A');
  });

  it('reports references back to the informant itself', () => {
    const lookup = lookupOf(informant('A', ['R']));

    const result = reduceReferences(informant('R', ['A']), lookup);

    expect(result.cycles.map(c => c.path)).toEqual([['R', 'A', 'R']]);
  });

  it('keeps dangling references and reports each unresolved edge', () => {
    const lookup = lookupOf(informant('A', ['Phantom']));

    const result = reduceReferences(informant('R', ['Ghost', 'A']), lookup);

    expect(result.informant.referenceNames).toEqual(['Ghost', 'A']);
    expect(result.pruned).toEqual([]);
    expect(result.dangling.map(d => [d.referenceName, d.referencedBy])).toEqual([
      ['Ghost', 'R'],
      ['Phantom', 'A'],
    ]);
    expect(result.dangling[0]).toBeInstanceOf(DanglingReferenceError);
    expect(result.dangling[0]?.message).toBe("Reference 'Ghost' from 'R' does not resolve");
  });

  it('does not modify the input', () => {
    const root = informant('R', ['X', 'Y']);
    const lookup = lookupOf(informant('X', ['Y']), informant('Y'));

    const result = reduceReferences(root, lookup);

    expect(root.referenceNames).toEqual(['X', 'Y']);
    expect(result.informant).not.toBe(root);
  });
});

describe('buildReferenceTree', () => {
  it('lists every path with cyclic and dangling names marked', () => {
    const lookup = lookupOf(informant('X', ['Y', 'Ghost']), informant('Y', ['X']));

    const tree = buildReferenceTree(informant('R', ['X', 'Y']), lookup);

    expect(tree).toEqual({
      name: 'R',
      resolved: true,
      cyclic: false,
      children: [
        {
          name: 'X',
          resolved: true,
          cyclic: false,
          children: [
            {
              name: 'Y',
              resolved: true,
              cyclic: false,
              children: [{ name: 'X', resolved: true, cyclic: true, children: [] }],
            },
            { name: 'Ghost', resolved: false, cyclic: false, children: [] },
          ],
        },
        {
          name: 'Y',
          resolved: true,
          cyclic: false,
          children: [
            {
              name: 'X',
              resolved: true,
              cyclic: false,
              children: [
                { name: 'Y', resolved: true, cyclic: true, children: [] },
                { name: 'Ghost', resolved: false, cyclic: false, children: [] },
              ],
            },
          ],
        },
      ],
    });
  });
});
