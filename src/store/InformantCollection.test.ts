/**
 * Tests for InformantCollection.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InformantCollection } from './InformantCollection.js';
import { InlineChunkExecutor } from '../query/ChunkedFilter.js';
import { DuplicateNameError, ExpressionSyntaxError, NotFoundError } from '../core/errors.js';
import type { Informant } from '../informant/types.js';

const FIXED_TIME = new Date('2024-03-05T10:20:30.000Z');

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

describe('InformantCollection', () => {
  let collection: InformantCollection;

  beforeEach(() => {
    collection = new InformantCollection({ clock: () => FIXED_TIME });
  });

  describe('append', () => {
    it('appends new names in order', () => {
      const report = collection.append([informant('a'), informant('b')]);

      expect(report.inserted).toEqual(['a', 'b']);
      expect(report.replaced).toEqual([]);
      expect(report.skipped).toEqual([]);
      expect(collection.names()).toEqual(['a', 'b']);
      expect(collection.size).toBe(2);
    });

    it('skips names already stored', () => {
      collection.append(informant('a'));

      const report = collection.append(informant('a', { note: 'second' }));

      expect(report.inserted).toEqual([]);
      expect(report.skipped).toHaveLength(1);
      expect(report.skipped[0]).toBeInstanceOf(DuplicateNameError);
      expect(report.skipped[0]?.informantName).toBe('a');
      expect(collection.size).toBe(1);
      expect(collection.require('a').fields).toEqual({});
    });

    it('replaces the stored row in place', () => {
      collection.append([informant('a'), informant('b')]);

      const report = collection.append(informant('a', {}, { description: 'updated' }), { replace: true });

      expect(report.replaced).toEqual(['a']);
      expect(collection.names()).toEqual(['a', 'b']);
      expect(collection.require('a').description).toBe('updated');
    });

    it('appends duplicates when allowed, and lookup returns the first', () => {
      collection.append(informant('a', { version: 1 }));

      collection.append(informant('a', { version: 2 }), { allowDuplicates: true });

      expect(collection.names()).toEqual(['a', 'a']);
      expect(collection.lookup('a')?.fields.version).toBe(1);
    });

    it('appends a second row when duplicates are allowed, even with replace', () => {
      collection.append(informant('a', { version: 1 }));

      const report = collection.append(informant('a', { version: 2 }), { allowDuplicates: true, replace: true });

      expect(report).toEqual({ inserted: ['a'], replaced: [], skipped: [] });
      expect(collection.names()).toEqual(['a', 'a']);
      expect(collection.lookup('a')?.fields.version).toBe(1);
    });

    it('records entry time and verification status', () => {
      collection.append(informant('pending'));
      collection.append(informant('checked'), { verify: true });

      expect(collection.rows().map(row => [row.name, row.entryTime, row.verificationStatus])).toEqual([
        ['pending', '2024-03-05T10:20:30.000Z', 'pending'],
        ['checked', '2024-03-05T10:20:30.000Z', '2024-03-05'],
      ]);
    });

    it('stores a copy of the informant', () => {
      const original = informant('a', { size: 1 });
      collection.append(original);

      original.fields.size = 99;

      expect(collection.require('a').fields.size).toBe(1);
    });
  });

  describe('update', () => {
    it('swaps the informant and keeps the row columns', () => {
      collection.append([informant('a', { version: 1 }), informant('b')], { verify: true });

      collection.update(informant('a', { version: 2 }));

      expect(collection.rows().map(row => [row.name, row.entryTime, row.verificationStatus])).toEqual([
        ['a', '2024-03-05T10:20:30.000Z', '2024-03-05'],
        ['b', '2024-03-05T10:20:30.000Z', '2024-03-05'],
      ]);
      expect(collection.require('a').fields.version).toBe(2);
    });

    it('stores a copy', () => {
      collection.append(informant('a', { version: 1 }));
      const updated = informant('a', { version: 2 });

      collection.update(updated);
      updated.fields.version = 3;

      expect(collection.require('a').fields.version).toBe(2);
    });

    it('throws for unknown names', () => {
      expect(() => collection.update(informant('ghost'))).toThrow(NotFoundError);
    });
  });

  describe('lookup', () => {
    it('returns copies', () => {
      collection.append(informant('a', { size: 1 }));

      const found = collection.require('a');
      found.fields.size = 2;

      expect(collection.require('a').fields.size).toBe(1);
    });

    it('returns null or throws for unknown names', () => {
      expect(collection.lookup('ghost')).toBeNull();
      expect(collection.has('ghost')).toBe(false);
      expect(() => collection.require('ghost')).toThrow(NotFoundError);
      expect(() => collection.require('ghost')).toThrow("Informant 'ghost' not found");
    });
  });

  it('lists attribute values with null for absent attributes', () => {
    collection.append([informant('a', { rowCount: 3 }), informant('b')]);

    expect(collection.attributeValues('rowCount')).toEqual([3, null]);
    expect(collection.attributeValues('name')).toEqual(['a', 'b']);
  });

  describe('filter', () => {
    beforeEach(() => {
      collection.append([
        informant('small', { size: 1 }),
        informant('large', { size: 50 }, { typeName: 'Table' }),
        informant('unsized'),
        informant('medium', { size: 10 }),
      ]);
    });

    it('returns matching rows as a new collection', () => {
      const matched = collection.filter('@size >= 10');

      expect(matched.names()).toEqual(['large', 'medium']);
      expect(matched.rows()[0]?.entryTime).toBe('2024-03-05T10:20:30.000Z');
      expect(collection.size).toBe(4);
    });

    it('passes onMissing and extra context through', () => {
      expect(collection.filter('@size < limit', { extraContext: { limit: 5 } }).names()).toEqual(['small']);
      expect(collection.filter('@size < limit', { extraContext: { limit: 5 }, onMissing: true }).names())
        .toEqual(['small', 'unsized']);
    });

    it('excludes rows lacking a member read from @self, whatever onMissing says', () => {
      expect(collection.filter('@self.size > 5', { onMissing: true }).names()).toEqual(['large', 'medium']);
    });

    it('uses the collection lineage for isinstance', () => {
      const typed = new InformantCollection({ lineage: { Table: ['Table', 'Data', 'Informant'] } });
      typed.append(collection.informants());

      expect(typed.filter("isinstance(@self, 'Data')").names()).toEqual(['large']);
    });

    it('does not share rows with the result', () => {
      const matched = collection.filter('@size == 1');
      matched.append(informant('small', { size: 2 }), { replace: true });

      expect(collection.require('small').fields.size).toBe(1);
    });

    it('rejects malformed expressions', () => {
      expect(() => collection.filter('@size >')).toThrow(ExpressionSyntaxError);
    });

    it('gives the same rows in parallel', async () => {
      const sequential = collection.filter('@size > 1 | @name == "small"');
      const parallel = await collection.filterParallel('@size > 1 | @name == "small"', {
        chunkSize: 1,
        executor: new InlineChunkExecutor(),
      });

      expect(parallel.names()).toEqual(sequential.names());
      expect(parallel.names()).toEqual(['small', 'large', 'medium']);
    });

    it('rejects malformed expressions in parallel', async () => {
      await expect(collection.filterParallel('(@size')).rejects.toThrow(ExpressionSyntaxError);
    });
  });
});
