/**
 * Types for the predicate query language.
 *
 * Expressions are parsed once into the tree below and interpreted per
 * informant. Attribute references (`@name`) resolve against the informant;
 * bare identifiers resolve against the caller's extra context.
 */

import type { TypeLineage } from '../ontology/types.js';

export type LiteralValue = string | number | boolean | null;

export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>=' | 'in' | 'not in';

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%';

export type ExpressionNode =
  | { kind: 'literal'; value: LiteralValue }
  | { kind: 'list'; elements: ExpressionNode[] }
  /** `@name`; the name `self` stands for the informant itself */
  | { kind: 'attribute'; name: string }
  | { kind: 'identifier'; name: string }
  | { kind: 'or'; left: ExpressionNode; right: ExpressionNode }
  | { kind: 'and'; left: ExpressionNode; right: ExpressionNode }
  | { kind: 'not'; operand: ExpressionNode }
  | { kind: 'compare'; operator: ComparisonOperator; left: ExpressionNode; right: ExpressionNode }
  | { kind: 'arithmetic'; operator: ArithmeticOperator; left: ExpressionNode; right: ExpressionNode }
  | { kind: 'negate'; operand: ExpressionNode }
  | { kind: 'member'; object: ExpressionNode; property: string }
  | { kind: 'index'; object: ExpressionNode; index: ExpressionNode }
  | { kind: 'call'; callee: string; args: ExpressionNode[] };

/** Node kinds that join or negate clauses. */
export type ConnectiveKind = 'or' | 'and' | 'not';

/**
 * Options shared by every way of running a predicate.
 */
export interface PredicateOptions {
  /** Value substituted for clauses that reference a missing attribute (default: false) */
  onMissing?: boolean;
  /** Values of bare identifiers */
  extraContext?: Record<string, unknown>;
  /** Prefix marking attribute references (default: '@') */
  escapeMarker?: string;
  /** Type lineage table used by `isinstance` */
  lineage?: TypeLineage;
}

export const DEFAULT_ESCAPE_MARKER = '@';
