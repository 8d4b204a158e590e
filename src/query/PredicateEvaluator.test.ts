/**
 * Tests for PredicateEvaluator.
 */

import { describe, it, expect } from 'vitest';
import { CompiledPredicate, compilePredicate, deepEqual, isTruthy } from './PredicateEvaluator.js';
import { ExpressionEvaluationError, ExpressionSyntaxError } from '../core/errors.js';
import type { Informant } from '../informant/types.js';

function informant(name: string, fields: Record<string, unknown> = {}, overrides: Partial<Informant> = {}): Informant {
  return {
    name,
    description: '',
    tags: [],
    referenceNames: [],
    typeName: 'Informant',
    sourceDepth: 0,
    algorithm: null,
    algorithmicParameters: null,
    constructorCommand: '',
    fields,
    ...overrides,
  };
}

const lineage = {
  Informant: ['Informant'],
  Data: ['Data', 'Informant'],
  Table: ['Table', 'Data', 'Informant'],
};

describe('CompiledPredicate', () => {
  it('combines clauses over different attributes', () => {
    const predicate = compilePredicate('(@a == 1) | (@b == 2)');
    const rows = [informant('first', { a: 1 }), informant('second', { b: 2 }), informant('third', { a: 0, b: 0 })];

    expect(rows.filter(row => predicate.matches(row)).map(row => row.name)).toEqual(['first', 'second']);
  });

  it('replaces clauses over missing attributes with onMissing', () => {
    const row = informant('row', { a: 1 });

    expect(compilePredicate('@a == 1 & @b == 2').matches(row)).toBe(false);
    expect(compilePredicate('@a == 1 & @b == 2', { onMissing: true }).matches(row)).toBe(true);
    expect(compilePredicate('@a == 5 | @b == 2', { onMissing: true }).matches(row)).toBe(true);
  });

  it('substitutes inside negations', () => {
    const row = informant('row');

    expect(compilePredicate('!(@b == 2)').matches(row)).toBe(true);
    expect(compilePredicate('!(@b == 2)', { onMissing: true }).matches(row)).toBe(false);
  });

  it('caches one rewrite per set of missing attributes', () => {
    const predicate = new CompiledPredicate('@a == 1 | @b == 2');

    const missingB = predicate.treeFor(informant('x', { a: 1 }));

    expect(predicate.treeFor(informant('y', { a: 3 }))).toBe(missingB);
    expect(predicate.treeFor(informant('z', { a: 1, b: 2 }))).toBe(predicate.tree);
  });

  it('treats core attributes as always present', () => {
    const predicate = compilePredicate("@name == 'row' & @description == ''");

    expect([...predicate.attributes].sort()).toEqual(['description', 'name']);
    expect(predicate.matches(informant('row'))).toBe(true);
  });

  it('tests membership in lists and strings', () => {
    const row = informant('row', { kind: 'tabular' }, { tags: ['raw', 'qc'] });

    expect(compilePredicate("'qc' in @tags").matches(row)).toBe(true);
    expect(compilePredicate("'final' not in @tags").matches(row)).toBe(true);
    expect(compilePredicate("'tab' in @kind").matches(row)).toBe(true);
  });

  it('resolves isinstance through the lineage table', () => {
    const table = informant('t', {}, { typeName: 'Table' });
    const options = { lineage };

    expect(compilePredicate("isinstance(@self, 'Data')", options).matches(table)).toBe(true);
    expect(compilePredicate("isinstance(@self, 'Table')", options).matches(informant('d', {}, { typeName: 'Data' }))).toBe(false);
    expect(compilePredicate("isinstance(@self, 'Table')").matches(table)).toBe(true);
  });

  it('measures values with len', () => {
    const row = informant('row', { columns: ['a', 'b', 'c'] });

    expect(compilePredicate('len(@columns) == 3').matches(row)).toBe(true);
    expect(compilePredicate('len(@self.columns) > 3').matches(row)).toBe(false);
  });

  it('reads bare identifiers from the extra context', () => {
    const predicate = compilePredicate('@size > threshold', { extraContext: { threshold: 10 } });

    expect(predicate.matches(informant('big', { size: 12 }))).toBe(true);
    expect(predicate.matches(informant('small', { size: 8 }))).toBe(false);
  });

  it('reads attributes of nested informants', () => {
    const algorithm = informant('align', { scriptPath: 'run.sh' });
    const row = informant('out', {}, { algorithm });

    expect(compilePredicate("@algorithm.name == 'align'").matches(row)).toBe(true);
    expect(compilePredicate("@algorithm.scriptPath == 'run.sh'").matches(row)).toBe(true);
  });

  it('uses a custom escape marker', () => {
    expect(compilePredicate('$a == 1', { escapeMarker: '$' }).matches(informant('row', { a: 1 }))).toBe(true);
  });

  it('follows floor modulo and exact equality', () => {
    const row = informant('row', { n: -7 });

    expect(compilePredicate('@n % 3 == 2').matches(row)).toBe(true);
    expect(compilePredicate('[1, [2]] == [1, [2]]').matches(row)).toBe(true);
    expect(compilePredicate("1 == '1'").matches(row)).toBe(false);
  });

  it('excludes rows whose evaluation fails', () => {
    const predicate = compilePredicate('@size / @count > 1');

    expect(predicate.matches(informant('zero', { size: 4, count: 0 }))).toBe(false);
    expect(predicate.matches(informant('ok', { size: 4, count: 2 }))).toBe(true);
  });

  it('reads members of @self at evaluation, not as missing attributes', () => {
    const predicate = compilePredicate('@self.x > 5', { onMissing: true });

    expect(predicate.matches(informant('without', {}))).toBe(false);
    expect(predicate.matches(informant('with', { x: 9 }))).toBe(true);
  });

  it.each([
    ['@n / 0', 'division by zero'],
    ['@n % 0', 'modulo by zero'],
    ['unknown', "name 'unknown' is not defined"],
    ['exec(1)', "function 'exec' is not defined"],
    ["@n < 'x'", "'<' not supported between number and string"],
    ['@algorithm.name', "null has no attribute 'name'"],
    ['@self.missing > 5', "informant 'row' has no attribute 'missing'"],
  ])('raises for %j', (expression, reason) => {
    const predicate = compilePredicate(expression);

    expect(() => predicate.test(informant('row', { n: 1 }))).toThrow(ExpressionEvaluationError);
    expect(() => predicate.test(informant('row', { n: 1 }))).toThrow(reason);
  });

  it('rejects malformed expressions before evaluating anything', () => {
    expect(() => compilePredicate('@a ==')).toThrow(ExpressionSyntaxError);
  });
});

describe('isTruthy', () => {
  it('treats empty and zero values as false', () => {
    expect([null, false, 0, '', [], {}].map(isTruthy)).toEqual([false, false, false, false, false, false]);
    expect([true, 1, 'x', [0], { a: 1 }].map(isTruthy)).toEqual([true, true, true, true, true]);
  });
});

describe('deepEqual', () => {
  it('compares objects by keys and values', () => {
    expect(deepEqual({ a: [1, 2] }, { a: [1, 2] })).toBe(true);
    expect(deepEqual({ a: 1 }, { a: 1, b: 2 })).toBe(false);
  });
});
