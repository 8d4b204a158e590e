/**
 * CollectionPersistence — JSON Lines files for informant collections.
 *
 * A saved collection holds one row per line, in collection order. A file
 * in which any line lacks the row columns is read as a plain list of
 * informants, which are appended to the target collection.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { CollectionFormatError } from '../core/errors.js';
import { informantSchema } from '../informant/schema.js';
import type { Informant } from '../informant/types.js';
import { InformantCollection, type InformantCollectionOptions } from './InformantCollection.js';
import type { AppendOptions, AppendReport, CollectionRow } from './types.js';

const ROW_COLUMNS = ['name', 'informant', 'entryTime', 'verificationStatus'] as const;

export const collectionRowSchema: z.ZodType<CollectionRow> = z.object({
  name: z.string(),
  informant: informantSchema,
  entryTime: z.string(),
  verificationStatus: z.string(),
});

export interface LoadCollectionOptions {
  /** Collection to load into (default: a new one) */
  into?: InformantCollection;
  /** Options for a new collection */
  collection?: InformantCollectionOptions;
  /** Policies applied when the file is a plain informant list */
  append?: AppendOptions;
}

export interface LoadedCollection {
  collection: InformantCollection;
  /** 'rows' for a saved collection, 'informants' for a plain list */
  format: 'rows' | 'informants';
  /** Present for plain lists */
  report?: AppendReport;
}

function hasRowColumns(value: unknown): boolean {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  return ROW_COLUMNS.every(column => Object.hasOwn(value, column));
}

/**
 * Serialize a collection as JSON Lines.
 */
export function serializeCollection(collection: InformantCollection): string {
  return collection.rows().map(row => `${JSON.stringify(row)}\n`).join('');
}

export async function saveCollection(collection: InformantCollection, path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, serializeCollection(collection), 'utf-8');
}

/**
 * Read a collection file.
 *
 * @throws CollectionFormatError when a line is not JSON or fails validation
 */
export async function loadCollection(path: string, options: LoadCollectionOptions = {}): Promise<LoadedCollection> {
  const content = await readFile(path, 'utf-8');
  const collection = options.into ?? new InformantCollection(options.collection);

  const entries: Array<{ line: number; value: unknown }> = [];
  content.split('\n').forEach((text, i) => {
    if (text.trim().length === 0) {
      return;
    }
    try {
      entries.push({ line: i + 1, value: JSON.parse(text) });
    } catch (err) {
      throw new CollectionFormatError(path, i + 1, err instanceof Error ? err.message : String(err));
    }
  });

  if (entries.every(entry => hasRowColumns(entry.value))) {
    const rows = entries.map(({ line, value }) => {
      const parsed = collectionRowSchema.safeParse(value);
      if (!parsed.success) {
        throw new CollectionFormatError(path, line, parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
      }
      return parsed.data;
    });
    collection.insertRows(rows);
    return { collection, format: 'rows' };
  }

  const informants: Informant[] = entries.map(({ line, value }) => {
    const parsed = informantSchema.safeParse(value);
    if (!parsed.success) {
      throw new CollectionFormatError(path, line, parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
    }
    return parsed.data;
  });
  const report = collection.append(informants, options.append);
  return { collection, format: 'informants', report };
}
