/**
 * PredicateEvaluator — Interprets parsed predicates against informants.
 *
 * This is a tree-walking interpreter over the nodes produced by
 * ExpressionParser. It never executes host code: the only callables are
 * the built-in functions below.
 *
 * Truthiness: null, false, 0, '' and empty lists or objects are false.
 */

import { ExpressionEvaluationError, errorMessage } from '../core/errors.js';
import { hasAttribute, isInformant, resolveAttribute } from '../informant/attributes.js';
import type { Informant } from '../informant/types.js';
import { moduleLogger, type Logger } from '../logging/logger.js';
import type { TypeLineage } from '../ontology/types.js';
import { parseExpression } from './ExpressionParser.js';
import { referencedAttributes, rewriteMissing } from './ExpressionRewriter.js';
import type { ArithmeticOperator, ComparisonOperator, ExpressionNode, PredicateOptions } from './types.js';
import { DEFAULT_ESCAPE_MARKER } from './types.js';

/**
 * Everything an expression can see while evaluated for one informant.
 */
export interface EvaluationScope {
  informant: Informant;
  extraContext: Readonly<Record<string, unknown>>;
  lineage: TypeLineage;
}

type Builtin = (args: unknown[], scope: EvaluationScope) => unknown;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function typeLabel(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  if (isInformant(value)) return 'informant';
  return typeof value;
}

const BUILTINS: Readonly<Record<string, Builtin>> = {
  isinstance: (args, scope) => {
    const [value, typeName] = args;
    if (args.length !== 2 || typeof typeName !== 'string') {
      throw new ExpressionEvaluationError('isinstance() takes a value and a type name');
    }
    if (!isInformant(value)) {
      return false;
    }
    return (scope.lineage[value.typeName] ?? [value.typeName]).includes(typeName);
  },
  len: args => {
    const [value] = args;
    if (args.length !== 1) {
      throw new ExpressionEvaluationError('len() takes exactly one argument');
    }
    if (typeof value === 'string' || Array.isArray(value)) {
      return value.length;
    }
    if (isPlainObject(value)) {
      return Object.keys(value).length;
    }
    throw new ExpressionEvaluationError(`object of type ${typeLabel(value)} has no len()`);
  },
};

export function isTruthy(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'string' || Array.isArray(value)) return value.length > 0;
  if (isInformant(value)) return true;
  if (isPlainObject(value)) return Object.keys(value).length > 0;
  return true;
}

/**
 * Structural equality over JSON-like values.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) {
    return true;
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => deepEqual(item, b[i]));
  }
  if (isPlainObject(a) && isPlainObject(b)) {
    const keys = Object.keys(a);
    return (
      keys.length === Object.keys(b).length &&
      keys.every(key => Object.hasOwn(b, key) && deepEqual(a[key], b[key]))
    );
  }
  return false;
}

function contains(container: unknown, item: unknown): boolean {
  if (Array.isArray(container)) {
    return container.some(element => deepEqual(element, item));
  }
  if (typeof container === 'string') {
    if (typeof item !== 'string') {
      throw new ExpressionEvaluationError(`'in <string>' requires a string, not ${typeLabel(item)}`);
    }
    return container.includes(item);
  }
  if (isPlainObject(container) && !isInformant(container)) {
    return typeof item === 'string' && Object.hasOwn(container, item);
  }
  throw new ExpressionEvaluationError(`argument of type ${typeLabel(container)} is not a container`);
}

function compare(operator: ComparisonOperator, left: unknown, right: unknown): boolean {
  switch (operator) {
    case '==': return deepEqual(left, right);
    case '!=': return !deepEqual(left, right);
    case 'in': return contains(right, left);
    case 'not in': return !contains(right, left);
  }

  let order: number;
  if (typeof left === 'number' && typeof right === 'number') {
    order = left - right;
  } else if (typeof left === 'string' && typeof right === 'string') {
    order = left < right ? -1 : left > right ? 1 : 0;
  } else {
    throw new ExpressionEvaluationError(
      `'${operator}' not supported between ${typeLabel(left)} and ${typeLabel(right)}`
    );
  }
  switch (operator) {
    case '<': return order < 0;
    case '<=': return order <= 0;
    case '>': return order > 0;
    case '>=': return order >= 0;
  }
}

function arithmetic(operator: ArithmeticOperator, left: unknown, right: unknown): unknown {
  if (operator === '+') {
    if (typeof left === 'string' && typeof right === 'string') {
      return left + right;
    }
    if (Array.isArray(left) && Array.isArray(right)) {
      return [...left, ...right];
    }
  }
  if (typeof left !== 'number' || typeof right !== 'number') {
    throw new ExpressionEvaluationError(
      `'${operator}' not supported between ${typeLabel(left)} and ${typeLabel(right)}`
    );
  }
  switch (operator) {
    case '+': return left + right;
    case '-': return left - right;
    case '*': return left * right;
    case '/':
      if (right === 0) throw new ExpressionEvaluationError('division by zero');
      return left / right;
    case '%':
      if (right === 0) throw new ExpressionEvaluationError('modulo by zero');
      return ((left % right) + right) % right;
  }
}

function member(object: unknown, property: string): unknown {
  if (isInformant(object)) {
    const resolved = resolveAttribute(object, property);
    if (!resolved.present) {
      throw new ExpressionEvaluationError(`informant '${object.name}' has no attribute '${property}'`);
    }
    return resolved.value;
  }
  if (isPlainObject(object) && Object.hasOwn(object, property)) {
    return object[property];
  }
  throw new ExpressionEvaluationError(`${typeLabel(object)} has no attribute '${property}'`);
}

function index(object: unknown, key: unknown): unknown {
  if (Array.isArray(object) || typeof object === 'string') {
    if (typeof key !== 'number' || !Number.isInteger(key)) {
      throw new ExpressionEvaluationError(`${typeLabel(object)} indices must be integers`);
    }
    const position = key < 0 ? object.length + key : key;
    if (position < 0 || position >= object.length) {
      throw new ExpressionEvaluationError(`${typeLabel(object)} index ${key} out of range`);
    }
    return object[position];
  }
  if (typeof key === 'string') {
    return member(object, key);
  }
  throw new ExpressionEvaluationError(`${typeLabel(object)} is not subscriptable with ${typeLabel(key)}`);
}

/**
 * Evaluate a parsed expression for one informant.
 *
 * @throws ExpressionEvaluationError on unknown names, bad member access,
 *   mismatched operand types, or division by zero
 */
export function evaluateExpression(node: ExpressionNode, scope: EvaluationScope): unknown {
  switch (node.kind) {
    case 'literal':
      return node.value;
    case 'list':
      return node.elements.map(element => evaluateExpression(element, scope));
    case 'attribute': {
      if (node.name === 'self') {
        return scope.informant;
      }
      const resolved = resolveAttribute(scope.informant, node.name);
      if (!resolved.present) {
        throw new ExpressionEvaluationError(`informant '${scope.informant.name}' has no attribute '${node.name}'`);
      }
      return resolved.value;
    }
    case 'identifier':
      if (!Object.hasOwn(scope.extraContext, node.name)) {
        throw new ExpressionEvaluationError(`name '${node.name}' is not defined`);
      }
      return scope.extraContext[node.name];
    case 'or':
      return isTruthy(evaluateExpression(node.left, scope)) || isTruthy(evaluateExpression(node.right, scope));
    case 'and':
      return isTruthy(evaluateExpression(node.left, scope)) && isTruthy(evaluateExpression(node.right, scope));
    case 'not':
      return !isTruthy(evaluateExpression(node.operand, scope));
    case 'compare':
      return compare(node.operator, evaluateExpression(node.left, scope), evaluateExpression(node.right, scope));
    case 'arithmetic':
      return arithmetic(node.operator, evaluateExpression(node.left, scope), evaluateExpression(node.right, scope));
    case 'negate': {
      const value = evaluateExpression(node.operand, scope);
      if (typeof value !== 'number') {
        throw new ExpressionEvaluationError(`bad operand type for unary -: ${typeLabel(value)}`);
      }
      return -value;
    }
    case 'member':
      return member(evaluateExpression(node.object, scope), node.property);
    case 'index':
      return index(evaluateExpression(node.object, scope), evaluateExpression(node.index, scope));
    case 'call': {
      const builtin = Object.hasOwn(BUILTINS, node.callee) ? BUILTINS[node.callee] : undefined;
      if (builtin === undefined) {
        throw new ExpressionEvaluationError(`function '${node.callee}' is not defined`);
      }
      return builtin(node.args.map(arg => evaluateExpression(arg, scope)), scope);
    }
  }
}

export interface CompiledPredicateOptions extends PredicateOptions {
  logger?: Logger;
}

/**
 * A predicate parsed once and applied to many informants.
 */
export class CompiledPredicate {
  readonly tree: ExpressionNode;
  /** Attribute names the expression references */
  readonly attributes: ReadonlySet<string>;
  private readonly onMissing: boolean;
  private readonly extraContext: Readonly<Record<string, unknown>>;
  private readonly lineage: TypeLineage;
  private readonly log: Logger;
  private readonly rewrites: Map<string, ExpressionNode> = new Map();

  /**
   * @throws ExpressionSyntaxError when the expression is malformed
   */
  constructor(
    public readonly expression: string,
    options: CompiledPredicateOptions = {}
  ) {
    this.tree = parseExpression(expression, options.escapeMarker ?? DEFAULT_ESCAPE_MARKER);
    this.attributes = referencedAttributes(this.tree);
    this.onMissing = options.onMissing ?? false;
    this.extraContext = options.extraContext ?? {};
    this.lineage = options.lineage ?? {};
    this.log = moduleLogger('PredicateEvaluator', options.logger);
  }

  /**
   * The tree to evaluate for an informant, with clauses over its missing
   * attributes replaced. Cached per set of missing attributes.
   */
  treeFor(informant: Informant): ExpressionNode {
    const missing = [...this.attributes].filter(name => !hasAttribute(informant, name)).sort();
    if (missing.length === 0) {
      return this.tree;
    }
    const key = missing.join('\u0000');
    let rewritten = this.rewrites.get(key);
    if (rewritten === undefined) {
      rewritten = rewriteMissing(this.tree, new Set(missing), this.onMissing);
      this.rewrites.set(key, rewritten);
    }
    return rewritten;
  }

  /**
   * Evaluate against one informant.
   *
   * @throws ExpressionEvaluationError when evaluation fails
   */
  test(informant: Informant): boolean {
    const scope: EvaluationScope = { informant, extraContext: this.extraContext, lineage: this.lineage };
    return isTruthy(evaluateExpression(this.treeFor(informant), scope));
  }

  /**
   * Evaluate against one informant; a failed evaluation is logged and
   * counts as no match.
   */
  matches(informant: Informant): boolean {
    try {
      return this.test(informant);
    } catch (err) {
      if (err instanceof ExpressionEvaluationError) {
        this.log.warn(
          { expression: this.expression, informant: informant.name, reason: err.reason },
          `Predicate evaluation failed for '${informant.name}'; row excluded`
        );
        return false;
      }
      this.log.error({ expression: this.expression, informant: informant.name, err: errorMessage(err) }, 'Unexpected predicate failure');
      throw err;
    }
  }
}

/**
 * Parse a predicate expression for repeated evaluation.
 *
 * @throws ExpressionSyntaxError when the expression is malformed
 */
export function compilePredicate(expression: string, options?: CompiledPredicateOptions): CompiledPredicate {
  return new CompiledPredicate(expression, options);
}
