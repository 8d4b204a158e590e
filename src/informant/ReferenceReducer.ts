/**
 * ReferenceReducer — Removes redundant reference names.
 *
 * A direct reference of an informant is redundant when the same name is
 * also reachable through one of its other references. The walk is a
 * depth-first traversal of the reference graph starting at the informant;
 * each reached informant is expanded once, and every edge into one of the
 * root's direct references marks that reference as seen again.
 *
 * Edges back onto the current path are reported as cycles and not
 * followed. Names without an informant in the lookup are reported as
dangling and not followed.
 */

import { CycleDetectedError, DanglingReferenceError } from '../core/errors.js';
import { moduleLogger, type Logger } from '../logging/logger.js';
import type { Informant, InformantLookup } from './types.js';

export interface ReduceReferencesOptions {
  logger?: Logger;
}

export interface ReduceReferencesResult {
  /** Copy of the input with the minimal reference list */
  informant: Informant;
  /** Direct references that were removed, in original order */
  pruned: string[];
  /** Cycles met during the walk */
  cycles: CycleDetectedError[];
  /** Edges to names the lookup cannot resolve, one per referring informant */
  dangling: DanglingReferenceError[];
}

/**
 * Nested view of the references reachable from an informant.
 */
export interface ReferenceTreeNode {
  name: string;
  /** False when the name has no informant in the lookup */
  resolved: boolean;
  /** True when the name closes a cycle; such nodes are not expanded */
  cyclic: boolean;
  children: ReferenceTreeNode[];
}

function uniqueStrings(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Reduce the reference names of an informant to those not reachable
 * through another reference. Duplicate direct references collapse to one.
 */
export function reduceReferences(
  informant: Informant,
  lookup: InformantLookup,
  options: ReduceReferencesOptions = {}
): ReduceReferencesResult {
  const log = moduleLogger('ReferenceReducer', options.logger);
  const direct = uniqueStrings(informant.referenceNames);

  // false: seen once, as a direct reference; true: reached again
  const tally = new Map<string, boolean>(direct.map(name => [name, false]));
  const expanded = new Set<string>([informant.name]);
  const cycles: CycleDetectedError[] = [];
  const dangling: DanglingReferenceError[] = [];

  const walk = (current: Informant, path: string[]): void => {
    for (const name of uniqueStrings(current.referenceNames)) {
      if (path.includes(name)) {
        const cycle = new CycleDetectedError([...path, name]);
        cycles.push(cycle);
        log.warn({ informant: informant.name, path: cycle.path }, cycle.message);
        continue;
      }

      if (current !== informant && tally.has(name)) {
        tally.set(name, true);
      }

      if (expanded.has(name)) {
        continue;
      }
      const target = lookup.lookup(name);
      if (target === null) {
        const missing = new DanglingReferenceError(name, current.name);
        dangling.push(missing);
        log.debug({ informant: informant.name, referencedBy: current.name, reference: name }, missing.message);
        continue;
      }
      expanded.add(name);
      walk(target, [...path, name]);
    }
  };

  walk(informant, [informant.name]);

  const kept = direct.filter(name => tally.get(name) !== true);
  const pruned = direct.filter(name => tally.get(name) === true);

  if (pruned.length > 0) {
    log.debug({ informant: informant.name, pruned }, 'Pruned redundant references');
  }

  return {
    informant: { ...informant, referenceNames: kept },
    pruned,
    cycles,
    dangling,
  };
}

/**
 * Build the tree of references reachable from an informant. Every path is
 * listed, so a name reachable along several paths appears several times;
 * a name already on the current path is marked cyclic and not expanded.
 */
export function buildReferenceTree(informant: Informant, lookup: InformantLookup): ReferenceTreeNode {
  const expand = (current: Informant, path: string[]): ReferenceTreeNode[] =>
    uniqueStrings(current.referenceNames).map(name => {
      if (path.includes(name)) {
        return { name, resolved: true, cyclic: true, children: [] };
      }
      const target = lookup.lookup(name);
      if (target === null) {
        return { name, resolved: false, cyclic: false, children: [] };
      }
      return { name, resolved: true, cyclic: false, children: expand(target, [...path, name]) };
    });

  return {
    name: informant.name,
    resolved: true,
    cyclic: false,
    children: expand(informant, [informant.name]),
  };
}
