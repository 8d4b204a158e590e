/**
 * Tests for ChunkedFilter.
 */

import { describe, it, expect } from 'vitest';
import {
  evaluateChunk,
  filterInChunks,
  InlineChunkExecutor,
  partitionRows,
  type ChunkExecutor,
  type ChunkResult,
  type ChunkTask,
} from './ChunkedFilter.js';
import { ExpressionSyntaxError } from '../core/errors.js';
import type { Informant } from '../informant/types.js';

function informant(name: string, fields: Record<string, unknown>): Informant {
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
  };
}

const rows = Array.from({ length: 10 }, (_, n) => informant(`row-${n}`, { n }));

/** Answers in reverse submission order. */
class ReversingExecutor implements ChunkExecutor {
  submitted: ChunkTask[] = [];

  async run(tasks: ChunkTask[]): Promise<ChunkResult[]> {
    this.submitted.push(...tasks);
    return tasks.map(task => evaluateChunk(task)).reverse();
  }
}

describe('partitionRows', () => {
  it('splits rows evenly across workers', () => {
    expect(partitionRows(10, { workers: 3 })).toEqual([[0, 4], [4, 8], [8, 10]]);
  });

  it('prefers an explicit chunk size', () => {
    expect(partitionRows(10, { workers: 2, chunkSize: 3 })).toEqual([[0, 3], [3, 6], [6, 9], [9, 10]]);
  });

  it('never makes empty chunks', () => {
    expect(partitionRows(3, { workers: 8 })).toEqual([[0, 1], [1, 2], [2, 3]]);
    expect(partitionRows(0, { workers: 4 })).toEqual([]);
  });

  it('defaults to one chunk', () => {
    expect(partitionRows(5)).toEqual([[0, 5]]);
  });
});

describe('evaluateChunk', () => {
  it('reports matches as positions within the chunk', () => {
    const result = evaluateChunk({
      index: 4,
      expression: '@n > limit',
      onMissing: false,
      extraContext: { limit: 7 },
      escapeMarker: '@',
      lineage: {},
      rows: rows.slice(6),
    });

    expect(result).toEqual({ index: 4, matches: [2, 3] });
  });
});

describe('filterInChunks', () => {
  it('matches a sequential scan', async () => {
    const positions = await filterInChunks(rows, '@n % 2 == 0', new InlineChunkExecutor(), { workers: 3 });

    expect(positions).toEqual([0, 2, 4, 6, 8]);
  });

  it('restores submission order whatever order results arrive in', async () => {
    const executor = new ReversingExecutor();

    const positions = await filterInChunks(rows, '@n >= 3 & @n < 8', executor, { chunkSize: 2 });

    expect(executor.submitted.map(task => task.index)).toEqual([0, 1, 2, 3, 4]);
    expect(positions).toEqual([3, 4, 5, 6, 7]);
  });

  it('sends options with every task', async () => {
    const executor = new ReversingExecutor();

    await filterInChunks(rows, '$n == 1 | $missing', executor, {
      workers: 2,
      escapeMarker: '$',
      onMissing: true,
      lineage: { Informant: ['Informant'] },
    });

    expect(executor.submitted).toHaveLength(2);
    expect(executor.submitted[1]).toMatchObject({
      index: 1,
      expression: '$n == 1 | $missing',
      onMissing: true,
      escapeMarker: '$',
      lineage: { Informant: ['Informant'] },
      extraContext: {},
    });
    expect(executor.submitted[1]?.rows.map(row => row.name)).toEqual(['row-5', 'row-6', 'row-7', 'row-8', 'row-9']);
  });

  it('excludes rows whose evaluation fails', async () => {
    const positions = await filterInChunks(rows, '10 / @n > 4', new InlineChunkExecutor(), { workers: 2 });

    expect(positions).toEqual([1, 2]);
  });

  it('rejects a malformed expression before submitting anything', async () => {
    const executor = new ReversingExecutor();

    await expect(filterInChunks(rows, '@n ==', executor)).rejects.toThrow(ExpressionSyntaxError);
    expect(executor.submitted).toEqual([]);
  });

  it('fails when a chunk goes unanswered', async () => {
    const silent: ChunkExecutor = { run: async () => [] };

    await expect(filterInChunks(rows, '@n == 1', silent)).rejects.toThrow('Chunk 0 produced no result');
  });

  it('returns nothing for an empty collection', async () => {
    expect(await filterInChunks([], '@n == 1', new InlineChunkExecutor())).toEqual([]);
  });
});
