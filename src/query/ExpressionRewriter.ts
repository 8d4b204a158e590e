/**
 * ExpressionRewriter — Substitutes clauses that reference missing attributes.
 *
 * A clause is a maximal sub-expression free of boolean connectives: the
 * operand of `and`, `or` or `not`, or the whole expression when it has no
 * connective at its top. A clause referencing any missing attribute is
 * replaced by a boolean literal, so the rest of the expression still
 * decides the outcome.
 */

import type { ConnectiveKind, ExpressionNode } from './types.js';

const CONNECTIVES: ReadonlySet<string> = new Set<ConnectiveKind>(['or', 'and', 'not']);

export function isConnective(node: ExpressionNode): boolean {
  return CONNECTIVES.has(node.kind);
}

/**
 * Attribute names referenced by an expression. `@self` is not an
 * attribute, and neither are members read from it: `@self.name` fails at
 * evaluation when the informant has no `name`.
 */
export function referencedAttributes(node: ExpressionNode): Set<string> {
  const names = new Set<string>();

  const visit = (current: ExpressionNode): void => {
    switch (current.kind) {
      case 'literal':
      case 'identifier':
        return;
      case 'attribute':
        if (current.name !== 'self') {
          names.add(current.name);
        }
        return;
      case 'list':
        current.elements.forEach(visit);
        return;
      case 'not':
      case 'negate':
        visit(current.operand);
        return;
      case 'or':
      case 'and':
      case 'compare':
      case 'arithmetic':
        visit(current.left);
        visit(current.right);
        return;
      case 'member':
        visit(current.object);
        return;
      case 'index':
        visit(current.object);
        visit(current.index);
        return;
      case 'call':
        current.args.forEach(visit);
        return;
    }
  };

  visit(node);
  return names;
}

/**
 * Replace every clause that references one of `missing` with `onMissing`.
 * Returns the input tree unchanged when nothing is missing.
 */
export function rewriteMissing(
  node: ExpressionNode,
  missing: ReadonlySet<string>,
  onMissing: boolean
): ExpressionNode {
  if (missing.size === 0) {
    return node;
  }

  switch (node.kind) {
    case 'or':
    case 'and':
      return {
        kind: node.kind,
        left: rewriteMissing(node.left, missing, onMissing),
        right: rewriteMissing(node.right, missing, onMissing),
      };
    case 'not':
      return { kind: 'not', operand: rewriteMissing(node.operand, missing, onMissing) };
    default:
      for (const name of referencedAttributes(node)) {
        if (missing.has(name)) {
          return { kind: 'literal', value: onMissing };
        }
      }
      return node;
  }
}
