/**
 * ChunkedFilter — Partitioned predicate evaluation.
 *
 * Rows are split into contiguous chunks. Each chunk becomes a self-contained
 * task (its rows, the expression and the options, all by value) that a
 * ChunkExecutor evaluates. Matches are reported as positions within the
 * chunk and mapped back to row positions in submission order, so the
 * result is ordered exactly like a sequential scan.
 */

import { z } from 'zod';
import { informantSchema } from '../informant/schema.js';
import type { Informant } from '../informant/types.js';
import type { Logger } from '../logging/logger.js';
import type { TypeLineage } from '../ontology/types.js';
import { parseExpression } from './ExpressionParser.js';
import { CompiledPredicate } from './PredicateEvaluator.js';
import type { PredicateOptions } from './types.js';
import { DEFAULT_ESCAPE_MARKER } from './types.js';

export interface ChunkTask {
  /** Submission order of the chunk */
  index: number;
  expression: string;
  onMissing: boolean;
  extraContext: Record<string, unknown>;
  escapeMarker: string;
  lineage: TypeLineage;
  rows: Informant[];
}

export interface ChunkResult {
  index: number;
  /** Positions within the chunk's rows that matched */
  matches: number[];
}

/**
 * Runs chunk tasks. Results may arrive in any order; callers sort by index.
 */
export interface ChunkExecutor {
  run(tasks: ChunkTask[]): Promise<ChunkResult[]>;
}

export const chunkTaskSchema: z.ZodType<ChunkTask> = z.object({
  index: z.number().int().nonnegative(),
  expression: z.string(),
  onMissing: z.boolean(),
  extraContext: z.record(z.unknown()),
  escapeMarker: z.string().min(1),
  lineage: z.record(z.array(z.string())),
  rows: z.array(informantSchema),
});

export const chunkResultSchema: z.ZodType<ChunkResult> = z.object({
  index: z.number().int().nonnegative(),
  matches: z.array(z.number().int().nonnegative()),
});

export interface PartitionOptions {
  /** Number of chunks to aim for (default: 1) */
  workers?: number;
  /** Rows per chunk; takes precedence over workers */
  chunkSize?: number;
}

/**
 * Half-open row ranges covering `rowCount` rows.
 */
export function partitionRows(rowCount: number, options: PartitionOptions = {}): Array<[number, number]> {
  if (rowCount === 0) {
    return [];
  }
  const workers = Math.max(1, Math.floor(options.workers ?? 1));
  const size = options.chunkSize !== undefined
    ? Math.max(1, Math.floor(options.chunkSize))
    : Math.ceil(rowCount / workers);

  const ranges: Array<[number, number]> = [];
  for (let start = 0; start < rowCount; start += size) {
    ranges.push([start, Math.min(start + size, rowCount)]);
  }
  return ranges;
}

/**
 * Evaluate one chunk.
 *
 * @throws ExpressionSyntaxError when the task's expression is malformed
 */
export function evaluateChunk(task: ChunkTask, logger?: Logger): ChunkResult {
  const predicate = new CompiledPredicate(task.expression, {
    onMissing: task.onMissing,
    extraContext: task.extraContext,
    escapeMarker: task.escapeMarker,
    lineage: task.lineage,
    ...(logger !== undefined ? { logger } : {}),
  });

  const matches: number[] = [];
  task.rows.forEach((row, position) => {
    if (predicate.matches(row)) {
      matches.push(position);
    }
  });
  return { index: task.index, matches };
}

/**
 * Evaluates tasks in the calling process on structured-clone copies, the
 * same isolation a worker process gets.
 */
export class InlineChunkExecutor implements ChunkExecutor {
  constructor(private readonly logger?: Logger) {}

  async run(tasks: ChunkTask[]): Promise<ChunkResult[]> {
    return tasks.map(task => evaluateChunk(structuredClone(task), this.logger));
  }
}

export interface ChunkedFilterOptions extends PredicateOptions, PartitionOptions {}

/**
 * Positions of the matching rows, ascending.
 *
 * @throws ExpressionSyntaxError before any chunk is submitted when the
 *   expression is malformed
 */
export async function filterInChunks(
  rows: Informant[],
  expression: string,
  executor: ChunkExecutor,
  options: ChunkedFilterOptions = {}
): Promise<number[]> {
  const escapeMarker = options.escapeMarker ?? DEFAULT_ESCAPE_MARKER;
  parseExpression(expression, escapeMarker);

  const ranges = partitionRows(rows.length, options);
  const tasks: ChunkTask[] = ranges.map(([start, end], index) => ({
    index,
    expression,
    onMissing: options.onMissing ?? false,
    extraContext: options.extraContext ?? {},
    escapeMarker,
    lineage: options.lineage ?? {},
    rows: rows.slice(start, end),
  }));

  const results = await executor.run(tasks);
  const byIndex = new Map(results.map(result => [result.index, result]));

  const positions: number[] = [];
  ranges.forEach(([start], index) => {
    const result = byIndex.get(index);
    if (result === undefined) {
      throw new Error(`Chunk ${index} produced no result`);
    }
    positions.push(...result.matches.map(offset => start + offset));
  });
  return positions;
}
