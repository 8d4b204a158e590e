/**
 * FolderHarvester — Builds one informant per file below a folder.
 *
 * The path of each file relative to the root folder is split into
 * segments, and the segments are assigned, in order, to the attribute
 * names of `attributeSequence`. Attributes supplied for the whole folder
 * are applied last and win over path-derived values.
 */

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { isCoreAttribute } from '../informant/attributes.js';
import type { InformantFactory } from '../informant/InformantFactory.js';
import type { Informant, InformantAttributes } from '../informant/types.js';
import { moduleLogger, type Logger } from '../logging/logger.js';

/** Core attributes a path segment may set. */
const SEGMENT_CORE_ATTRIBUTES = ['name', 'description', 'constructorCommand'] as const;

type SegmentCoreAttribute = typeof SEGMENT_CORE_ATTRIBUTES[number];

export interface HarvestOptions {
  /** Type of every harvested informant */
  typeName: string;
  /** Attribute names for the relative path segments, outermost first */
  attributeSequence?: string[];
  /** Store the file path in the `location` field (default: false) */
  useLocation?: boolean;
  /** Attributes applied to every informant */
  attributes?: InformantAttributes;
  logger?: Logger;
}

function isSegmentCoreAttribute(name: string): name is SegmentCoreAttribute {
  return SEGMENT_CORE_ATTRIBUTES.some(attribute => attribute === name);
}

/**
 * Relative path segments of every file below `rootFolder`, in sorted
 * directory order.
 */
export async function folderPathSequences(rootFolder: string): Promise<string[][]> {
  const sequences: string[][] = [];

  const walk = async (absDir: string, prefix: string[]): Promise<void> => {
    const entries = await readdir(absDir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (entry.isDirectory()) {
        await walk(join(absDir, entry.name), [...prefix, entry.name]);
      } else if (entry.isFile()) {
        sequences.push([...prefix, entry.name]);
      }
    }
  };

  await walk(rootFolder, []);
  return sequences;
}

/**
 * Harvest informants from the files below `rootFolder`.
 *
 * @throws TypeNotConstructibleError or InformantValidationError from the factory
 */
export async function harvestFolder(
  rootFolder: string,
  factory: InformantFactory,
  options: HarvestOptions
): Promise<Informant[]> {
  const log = moduleLogger('FolderHarvester', options.logger);
  const sequence = options.attributeSequence ?? [];
  const shared = options.attributes ?? {};

  for (const attribute of sequence) {
    if (isCoreAttribute(attribute) && !isSegmentCoreAttribute(attribute)) {
      throw new Error(`Path segments cannot set the '${attribute}' attribute`);
    }
  }

  const paths = await folderPathSequences(rootFolder);
  log.debug({ rootFolder, files: paths.length }, 'Harvesting folder');

  return paths.map(segments => {
    const core: Partial<Record<SegmentCoreAttribute, string>> = {};
    const fields: Record<string, unknown> = {};

    if (options.useLocation === true) {
      fields.location = join(rootFolder, ...segments);
    }

    sequence.forEach((attribute, i) => {
      const segment = segments[i];
      if (segment === undefined) {
        return;
      }
      if (isSegmentCoreAttribute(attribute)) {
        core[attribute] = segment;
      } else {
        fields[attribute] = segment;
      }
    });

    return factory.create(options.typeName, {
      ...core,
      ...shared,
      fields: { ...fields, ...(shared.fields ?? {}) },
    }, { suppress: true });
  });
}
