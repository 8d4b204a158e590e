/**
 * Types for the informant collection store.
 *
 * A collection is an ordered table of rows. Each row carries one informant
 * together with the bookkeeping the store adds when the informant is
 * appended.
 */

import type { DuplicateNameError } from '../core/errors.js';
import type { Informant } from '../informant/types.js';

/**
 * `'pending'` until verified; a verified row holds its verification date
 * as `YYYY-MM-DD`.
 */
export type VerificationStatus = 'pending' | string;

export interface CollectionRow {
  name: string;
  informant: Informant;
  /** ISO timestamp of the append */
  entryTime: string;
  verificationStatus: VerificationStatus;
}

export interface AppendOptions {
  /** Append rows whose name is already stored (default: false) */
  allowDuplicates?: boolean;
  /** Overwrite the first row with the same name in place; ignored under allowDuplicates (default: false) */
  replace?: boolean;
  /** Mark appended rows verified as of today (default: false) */
  verify?: boolean;
}

export interface AppendReport {
  /** Names appended as new rows */
  inserted: string[];
  /** Names whose existing row was overwritten */
  replaced: string[];
  /** Rejected duplicates */
  skipped: DuplicateNameError[];
}

export interface CollectionFilterOptions {
  /** Value of clauses over missing attributes (default: false) */
  onMissing?: boolean;
  /** Values of bare identifiers in the expression */
  extraContext?: Record<string, unknown>;
}

/** Source of the current time; replaced in tests. */
export type Clock = () => Date;
