/**
 * InformantCollection — Ordered, name-indexed store of informants.
 *
 * This class handles:
 * - Appending informants with duplicate, replace and verify policies
 * - Name lookup (first row wins when duplicates were allowed)
 * - Sequential and chunked predicate filtering
 *
 * Stored and returned informants are copies; callers cannot reach into the
 * collection's rows by mutating what they passed in or got back.
 */

import { DuplicateNameError, NotFoundError } from '../core/errors.js';
import { resolveAttribute } from '../informant/attributes.js';
import type { Informant, InformantLookup } from '../informant/types.js';
import { moduleLogger, type Logger } from '../logging/logger.js';
import type { TypeLineage } from '../ontology/types.js';
import {
  filterInChunks,
  InlineChunkExecutor,
  type ChunkExecutor,
} from '../query/ChunkedFilter.js';
import { CompiledPredicate } from '../query/PredicateEvaluator.js';
import { DEFAULT_ESCAPE_MARKER } from '../query/types.js';
import type {
  AppendOptions,
  AppendReport,
  Clock,
  CollectionFilterOptions,
  CollectionRow,
} from './types.js';

export interface InformantCollectionOptions {
  /** Type lineage table used by `isinstance` in filter expressions */
  lineage?: TypeLineage;
  /** Attribute reference marker in filter expressions (default: '@') */
  escapeMarker?: string;
  logger?: Logger;
  clock?: Clock;
}

export interface ParallelFilterOptions extends CollectionFilterOptions {
  /** Number of chunks (default: 2) */
  workers?: number;
  /** Rows per chunk; takes precedence over workers */
  chunkSize?: number;
  /** Where chunks run (default: in process) */
  executor?: ChunkExecutor;
}

export class InformantCollection implements InformantLookup {
  private readonly table: CollectionRow[] = [];
  private readonly lineage: TypeLineage;
  private readonly escapeMarker: string;
  private readonly logger: Logger | undefined;
  private readonly log: Logger;
  private readonly clock: Clock;

  constructor(private readonly options: InformantCollectionOptions = {}) {
    this.lineage = options.lineage ?? {};
    this.escapeMarker = options.escapeMarker ?? DEFAULT_ESCAPE_MARKER;
    this.logger = options.logger;
    this.log = moduleLogger('InformantCollection', options.logger);
    this.clock = options.clock ?? (() => new Date());
  }

  get size(): number {
    return this.table.length;
  }

  /**
   * Append informants in order.
   */
  append(informants: Informant | Informant[], options: AppendOptions = {}): AppendReport {
    const batch = Array.isArray(informants) ? informants : [informants];
    const report: AppendReport = { inserted: [], replaced: [], skipped: [] };

    for (const informant of batch) {
      const row = this.newRow(informant, options.verify ?? false);
      const existing = this.table.findIndex(r => r.name === informant.name);

      if (existing === -1 || options.allowDuplicates === true) {
        this.table.push(row);
        report.inserted.push(row.name);
      } else if (options.replace === true) {
        this.table[existing] = row;
        report.replaced.push(row.name);
      } else {
        const skipped = new DuplicateNameError(informant.name);
        report.skipped.push(skipped);
        this.log.warn({ informant: informant.name }, skipped.message);
      }
    }

    return report;
  }

  /**
   * Add rows exactly as given, keeping their bookkeeping columns.
   */
  insertRows(rows: CollectionRow[]): void {
    for (const row of rows) {
      this.table.push(structuredClone(row));
    }
  }

  /**
   * Swap the informant held by the first row with its name, keeping the
   * row's entry time and verification status.
   *
   * @throws NotFoundError when no row has the name
   */
  update(informant: Informant): void {
    const row = this.table.find(r => r.name === informant.name);
    if (row === undefined) {
      throw new NotFoundError(informant.name);
    }
    row.informant = structuredClone(informant);
  }

  /**
   * First informant with the given name, or null.
   */
  lookup(name: string): Informant | null {
    const row = this.table.find(r => r.name === name);
    return row !== undefined ? structuredClone(row.informant) : null;
  }

  /**
   * @throws NotFoundError when no informant has the name
   */
  require(name: string): Informant {
    const informant = this.lookup(name);
    if (informant === null) {
      throw new NotFoundError(name);
    }
    return informant;
  }

  has(name: string): boolean {
    return this.table.some(r => r.name === name);
  }

  names(): string[] {
    return this.table.map(r => r.name);
  }

  rows(): CollectionRow[] {
    return structuredClone(this.table);
  }

  informants(): Informant[] {
    return this.table.map(r => structuredClone(r.informant));
  }

  /**
   * Value of an attribute for every row, in order; null where the
   * informant does not have the attribute.
   */
  attributeValues(attribute: string): unknown[] {
    return this.table.map(r => {
      const resolved = resolveAttribute(r.informant, attribute);
      return resolved.present ? structuredClone(resolved.value) : null;
    });
  }

  /**
   * Rows whose informant satisfies the expression, as a new collection.
   *
   * @throws ExpressionSyntaxError when the expression is malformed
   */
  filter(expression: string, options: CollectionFilterOptions = {}): InformantCollection {
    const predicate = new CompiledPredicate(expression, {
      escapeMarker: this.escapeMarker,
      lineage: this.lineage,
      ...(options.onMissing !== undefined ? { onMissing: options.onMissing } : {}),
      ...(options.extraContext !== undefined ? { extraContext: options.extraContext } : {}),
      ...(this.logger !== undefined ? { logger: this.logger } : {}),
    });

    return this.subset(this.table.filter(row => predicate.matches(row.informant)));
  }

  /**
   * Same rows, in the same order, as `filter`, evaluated chunk by chunk
   * through an executor.
   *
   * @throws ExpressionSyntaxError when the expression is malformed
   */
  async filterParallel(expression: string, options: ParallelFilterOptions = {}): Promise<InformantCollection> {
    const executor = options.executor ?? new InlineChunkExecutor(this.logger);
    const positions = await filterInChunks(
      this.table.map(row => row.informant),
      expression,
      executor,
      {
        escapeMarker: this.escapeMarker,
        lineage: this.lineage,
        workers: options.workers ?? 2,
        ...(options.chunkSize !== undefined ? { chunkSize: options.chunkSize } : {}),
        ...(options.onMissing !== undefined ? { onMissing: options.onMissing } : {}),
        ...(options.extraContext !== undefined ? { extraContext: options.extraContext } : {}),
      }
    );

    const matched: CollectionRow[] = [];
    for (const position of positions) {
      const row = this.table[position];
      if (row !== undefined) {
        matched.push(row);
      }
    }
    return this.subset(matched);
  }

  private subset(rows: CollectionRow[]): InformantCollection {
    const result = new InformantCollection(this.options);
    result.insertRows(rows);
    return result;
  }

  private newRow(informant: Informant, verify: boolean): CollectionRow {
    const now = this.clock();
    return {
      name: informant.name,
      informant: structuredClone(informant),
      entryTime: now.toISOString(),
      verificationStatus: verify ? now.toISOString().slice(0, 10) : 'pending',
    };
  }
}

export function createInformantCollection(options?: InformantCollectionOptions): InformantCollection {
  return new InformantCollection(options);
}
