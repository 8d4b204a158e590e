/**
 * Location operations for informants carrying the `location` and `file`
 * capabilities.
 *
 * All of them read `fields.location` (and `fields.fileType` where a file
 * type is needed). Operations that change the location return a new
 * informant; the input is never modified.
 *
 * Depth below a directory location counts path segments: files directly in
 * the location are at depth 0, files in its subdirectories at depth 1, and
 * so on.
 */

import { readdir, rename, stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { join } from 'node:path';
import { moduleLogger, type Logger } from '../logging/logger.js';
import type { Informant } from './types.js';

export interface TypedFileCountOptions {
  /** File name endings to count (default: the informant's fileType) */
  fileTypes?: string | string[];
  /** Deepest directory level searched (default: unlimited) */
  maxDepth?: number;
}

export interface AutoUpdateLocationOptions {
  /** Deepest directory level searched (default: unlimited) */
  maxDepth?: number;
  logger?: Logger;
}

export interface RenameLocationOptions {
  logger?: Logger;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (err) {
    if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
      return null;
    }
    throw err;
  }
}

function stringField(informant: Informant, field: string): string | null {
  const value = informant.fields[field];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

export function locationOf(informant: Informant): string | null {
  return stringField(informant, 'location');
}

export function fileTypeOf(informant: Informant): string | null {
  return stringField(informant, 'fileType');
}

function withLocation(informant: Informant, location: string): Informant {
  return { ...informant, fields: { ...informant.fields, location } };
}

function unchanged(informant: Informant): Informant {
  return { ...informant, fields: { ...informant.fields } };
}

/**
 * Paths of the files below `root`, in sorted order, skipping directories
 * deeper than `maxDepth`.
 */
async function walkFiles(root: string, maxDepth: number | undefined): Promise<string[]> {
  const files: string[] = [];

  const walk = async (dir: string, depth: number): Promise<void> => {
    if (maxDepth !== undefined && depth > maxDepth) {
      return;
    }
    const entries = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(path, depth + 1);
      } else if (entry.isFile()) {
        files.push(path);
      }
    }
  };

  await walk(root, 0);
  return files;
}

/**
 * Names of the files directly inside the location, sorted. Null when the
 * informant has no location or the location is not a directory.
 */
export async function listFiles(informant: Informant): Promise<string[] | null> {
  const location = locationOf(informant);
  if (location === null || !(await statOrNull(location))?.isDirectory()) {
    return null;
  }
  const entries = await readdir(location, { withFileTypes: true });
  return entries.filter(entry => entry.isFile()).map(entry => entry.name).sort();
}

/**
 * Number of files directly inside the location, or null when it is not a
 * directory.
 */
export async function countFiles(informant: Informant): Promise<number | null> {
  const files = await listFiles(informant);
  return files === null ? null : files.length;
}

/**
 * Whether something exists at the location.
 */
export async function isPopulated(informant: Informant): Promise<boolean> {
  const location = locationOf(informant);
  return location !== null && (await statOrNull(location)) !== null;
}

/**
 * Count files whose names end with one of the file types.
 *
 * A file location counts as one when its own name matches. A missing
 * location counts zero. Returns null when no file type is given and the
 * informant has none.
 */
export async function countTypedFiles(
  informant: Informant,
  options: TypedFileCountOptions = {}
): Promise<number | null> {
  const given = options.fileTypes;
  const own = fileTypeOf(informant);
  const fileTypes = given === undefined ? (own !== null ? [own] : null) : Array.isArray(given) ? given : [given];
  if (fileTypes === null) {
    return null;
  }

  const location = locationOf(informant);
  const stats = location !== null ? await statOrNull(location) : null;
  if (location === null || stats === null) {
    return 0;
  }

  const matches = (path: string): boolean => fileTypes.some(fileType => path.endsWith(fileType));
  if (stats.isFile()) {
    return matches(location) ? 1 : 0;
  }
  if (stats.isDirectory()) {
    return (await walkFiles(location, options.maxDepth)).filter(matches).length;
  }
  return 0;
}

/**
 * Point a directory location at the one file below it whose name ends with
 * the informant's fileType.
 *
 * The informant comes back with the same location when it has no fileType,
 * its location is not a directory, or the number of matching files is not
 * exactly one.
 */
export async function autoUpdateLocation(
  informant: Informant,
  options: AutoUpdateLocationOptions = {}
): Promise<Informant> {
  const log = moduleLogger('location', options.logger);
  const fileType = fileTypeOf(informant);
  const location = locationOf(informant);
  if (fileType === null || location === null || !(await statOrNull(location))?.isDirectory()) {
    return unchanged(informant);
  }

  const matching = (await walkFiles(location, options.maxDepth)).filter(path => path.endsWith(fileType));
  const [only] = matching;
  if (only !== undefined && matching.length === 1) {
    log.debug({ informant: informant.name, location: only }, 'Location updated');
    return withLocation(informant, only);
  }
  if (matching.length > 1) {
    log.warn({ informant: informant.name, fileType, matches: matching.length },
      `Multiple files found matching ${fileType}; location not updated`);
  } else {
    log.warn({ informant: informant.name, fileType }, `No files found matching ${fileType}`);
  }
  return unchanged(informant);
}

/**
 * Move whatever is at the location to `newLocation` and return the
 * informant pointing there. When nothing exists at the location, a warning
 * is logged and the informant comes back unchanged.
 */
export async function renameLocation(
  informant: Informant,
  newLocation: string,
  options: RenameLocationOptions = {}
): Promise<Informant> {
  const log = moduleLogger('location', options.logger);
  const location = locationOf(informant);
  if (location === null || (await statOrNull(location)) === null) {
    log.warn({ informant: informant.name, location }, `Nothing exists at ${location ?? '(no location)'}`);
    return unchanged(informant);
  }

  await rename(location, newLocation);
  return withLocation(informant, newLocation);
}
