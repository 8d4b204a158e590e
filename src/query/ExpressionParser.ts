/**
 * ExpressionParser — Tokenizer and recursive-descent parser for predicates.
 *
 * Precedence, lowest first:
 *   `|` `or`
 *   `&` `and`
 *   `!` `~` `not`
 *   `==` `!=` `<` `<=` `>` `>=` `in` `not in`
 *   `+` `-`
 *   `*` `/` `%`
 *   unary `-`
 *   `.name` `[index]` `fn(args)`
 *
 * Comparisons do not chain.
 */

import { ExpressionSyntaxError } from '../core/errors.js';
import type {
  ArithmeticOperator,
  ComparisonOperator,
  ExpressionNode,
  LiteralValue,
} from './types.js';
import { DEFAULT_ESCAPE_MARKER } from './types.js';

type TokenKind = 'number' | 'string' | 'identifier' | 'attribute' | 'keyword' | 'punct' | 'eof';

interface Token {
  kind: TokenKind;
  text: string;
  /** Parsed value of number and string tokens */
  value?: string | number;
  position: number;
}

const KEYWORDS: ReadonlySet<string> = new Set(['and', 'or', 'not', 'in']);

const LITERAL_WORDS: ReadonlyMap<string, LiteralValue> = new Map<string, LiteralValue>([
  ['true', true],
  ['True', true],
  ['false', false],
  ['False', false],
  ['null', null],
  ['None', null],
]);

/** Longest first, so `<=` wins over `<`. */
const PUNCTUATION = [
  '==', '!=', '<=', '>=',
  '<', '>', '&', '|', '!', '~', '+', '-', '*', '/', '%', '(', ')', '[', ']', ',', '.',
] as const;

const COMPARISON_TOKENS: ReadonlySet<string> = new Set(['==', '!=', '<', '<=', '>', '>=']);

const ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  "'": "'",
  '"': '"',
};

function isIdentifierStart(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z_]/.test(ch);
}

function isIdentifierPart(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9_]/.test(ch);
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

/**
 * Split an expression into tokens.
 *
 * @throws ExpressionSyntaxError on an unexpected character or an
 *   unterminated string
 */
export function tokenize(expression: string, escapeMarker: string = DEFAULT_ESCAPE_MARKER): Token[] {
  if (escapeMarker.length === 0) {
    throw new ExpressionSyntaxError(expression, 0, 'escape marker must not be empty');
  }

  const tokens: Token[] = [];
  let i = 0;

  const readIdentifier = (start: number): string => {
    let end = start;
    while (isIdentifierPart(expression[end])) {
      end++;
    }
    return expression.slice(start, end);
  };

  while (i < expression.length) {
    const ch = expression[i];

    if (ch === undefined || /\s/.test(ch)) {
      i++;
      continue;
    }

    if (expression.startsWith(escapeMarker, i) && isIdentifierStart(expression[i + escapeMarker.length])) {
      const name = readIdentifier(i + escapeMarker.length);
      tokens.push({ kind: 'attribute', text: name, position: i });
      i += escapeMarker.length + name.length;
      continue;
    }

    if (isDigit(ch) || (ch === '.' && isDigit(expression[i + 1]))) {
      const match = /^(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?/.exec(expression.slice(i));
      const text = match?.[0] ?? ch;
      tokens.push({ kind: 'number', text, value: Number(text), position: i });
      i += text.length;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const start = i;
      let value = '';
      i++;
      let closed = false;
      while (i < expression.length) {
        const c = expression[i];
        if (c === ch) {
          closed = true;
          i++;
          break;
        }
        if (c === '\\') {
          const next = expression[i + 1];
          if (next === undefined) {
            break;
          }
          value += ESCAPES[next] ?? next;
          i += 2;
          continue;
        }
        value += c;
        i++;
      }
      if (!closed) {
        throw new ExpressionSyntaxError(expression, start, 'unterminated string');
      }
      tokens.push({ kind: 'string', text: expression.slice(start, i), value, position: start });
      continue;
    }

    if (isIdentifierStart(ch)) {
      const word = readIdentifier(i);
      tokens.push({ kind: KEYWORDS.has(word) ? 'keyword' : 'identifier', text: word, position: i });
      i += word.length;
      continue;
    }

    const punct = PUNCTUATION.find(p => expression.startsWith(p, i));
    if (punct !== undefined) {
      tokens.push({ kind: 'punct', text: punct, position: i });
      i += punct.length;
      continue;
    }

    throw new ExpressionSyntaxError(expression, i, `unexpected character '${ch}'`);
  }

  tokens.push({ kind: 'eof', text: '', position: expression.length });
  return tokens;
}

class Parser {
  private pos = 0;

  constructor(
    private readonly expression: string,
    private readonly tokens: Token[]
  ) {}

  parse(): ExpressionNode {
    if (this.peek().kind === 'eof') {
      throw this.error('empty expression');
    }
    const node = this.parseOr();
    if (this.peek().kind !== 'eof') {
      throw this.error(`unexpected '${this.peek().text}'`);
    }
    return node;
  }

  private peek(offset = 0): Token {
    const token = this.tokens[this.pos + offset] ?? this.tokens[this.tokens.length - 1];
    if (token === undefined) {
      throw new ExpressionSyntaxError(this.expression, 0, 'no tokens');
    }
    return token;
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') {
      this.pos++;
    }
    return token;
  }

  private isPunct(text: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.kind === 'punct' && token.text === text;
  }

  private isKeyword(text: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.kind === 'keyword' && token.text === text;
  }

  private expectPunct(text: string): void {
    if (!this.isPunct(text)) {
      const found = this.peek();
      throw this.error(found.kind === 'eof' ? `expected '${text}' at end of input` : `expected '${text}', found '${found.text}'`);
    }
    this.next();
  }

  private error(detail: string): ExpressionSyntaxError {
    return new ExpressionSyntaxError(this.expression, this.peek().position, detail);
  }

  private parseOr(): ExpressionNode {
    let left = this.parseAnd();
    while (this.isPunct('|') || this.isKeyword('or')) {
      this.next();
      left = { kind: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ExpressionNode {
    let left = this.parseNot();
    while (this.isPunct('&') || this.isKeyword('and')) {
      this.next();
      left = { kind: 'and', left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): ExpressionNode {
    if (this.isPunct('!') || this.isPunct('~') || this.isKeyword('not')) {
      this.next();
      return { kind: 'not', operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private comparisonOperator(): ComparisonOperator | null {
    const token = this.peek();
    if (token.kind === 'punct' && COMPARISON_TOKENS.has(token.text)) {
      switch (token.text) {
        case '==': return '==';
        case '!=': return '!=';
        case '<': return '<';
        case '<=': return '<=';
        case '>': return '>';
        case '>=': return '>=';
      }
    }
    if (this.isKeyword('in')) {
      return 'in';
    }
    if (this.isKeyword('not') && this.isKeyword('in', 1)) {
      return 'not in';
    }
    return null;
  }

  private parseComparison(): ExpressionNode {
    const left = this.parseAdditive();
    const operator = this.comparisonOperator();
    if (operator === null) {
      return left;
    }
    this.next();
    if (operator === 'not in') {
      this.next();
    }
    const right = this.parseAdditive();
    if (this.comparisonOperator() !== null) {
      throw this.error('chained comparisons are not supported; join them with &');
    }
    return { kind: 'compare', operator, left, right };
  }

  private parseAdditive(): ExpressionNode {
    let left = this.parseMultiplicative();
    for (;;) {
      let operator: ArithmeticOperator;
      if (this.isPunct('+')) operator = '+';
      else if (this.isPunct('-')) operator = '-';
      else return left;
      this.next();
      left = { kind: 'arithmetic', operator, left, right: this.parseMultiplicative() };
    }
  }

  private parseMultiplicative(): ExpressionNode {
    let left = this.parseUnary();
    for (;;) {
      let operator: ArithmeticOperator;
      if (this.isPunct('*')) operator = '*';
      else if (this.isPunct('/')) operator = '/';
      else if (this.isPunct('%')) operator = '%';
      else return left;
      this.next();
      left = { kind: 'arithmetic', operator, left, right: this.parseUnary() };
    }
  }

  private parseUnary(): ExpressionNode {
    if (this.isPunct('-')) {
      this.next();
      return { kind: 'negate', operand: this.parseUnary() };
    }
    return this.parsePostfix();
  }

  private parsePostfix(): ExpressionNode {
    let node = this.parsePrimary();
    for (;;) {
      if (this.isPunct('.')) {
        this.next();
        const name = this.next();
        if (name.kind !== 'identifier' && name.kind !== 'keyword') {
          throw new ExpressionSyntaxError(this.expression, name.position, 'expected a name after \'.\'');
        }
        node = { kind: 'member', object: node, property: name.text };
      } else if (this.isPunct('[')) {
        this.next();
        const index = this.parseOr();
        this.expectPunct(']');
        node = { kind: 'index', object: node, index };
      } else if (this.isPunct('(')) {
        if (node.kind !== 'identifier') {
          throw this.error('only named functions can be called');
        }
        this.next();
        node = { kind: 'call', callee: node.name, args: this.parseList(')') };
      } else {
        return node;
      }
    }
  }

  private parseList(close: string): ExpressionNode[] {
    const elements: ExpressionNode[] = [];
    if (this.isPunct(close)) {
      this.next();
      return elements;
    }
    for (;;) {
      elements.push(this.parseOr());
      if (this.isPunct(',')) {
        this.next();
        if (this.isPunct(close)) {
          this.next();
          return elements;
        }
        continue;
      }
      this.expectPunct(close);
      return elements;
    }
  }

  private parsePrimary(): ExpressionNode {
    const token = this.peek();

    switch (token.kind) {
      case 'number':
      case 'string':
        this.next();
        return { kind: 'literal', value: token.value ?? null };
      case 'attribute':
        this.next();
        return { kind: 'attribute', name: token.text };
      case 'identifier': {
        this.next();
        const literal = LITERAL_WORDS.get(token.text);
        if (literal !== undefined) {
          return { kind: 'literal', value: literal };
        }
        return { kind: 'identifier', name: token.text };
      }
      case 'punct':
        if (token.text === '(') {
          this.next();
          const inner = this.parseOr();
          this.expectPunct(')');
          return inner;
        }
        if (token.text === '[') {
          this.next();
          return { kind: 'list', elements: this.parseList(']') };
        }
        break;
      case 'eof':
        throw this.error('unexpected end of expression');
      case 'keyword':
        break;
    }
    throw this.error(`unexpected '${token.text}'`);
  }
}

/**
 * Parse a predicate expression.
 *
 * @throws ExpressionSyntaxError when the expression is malformed
 */
export function parseExpression(expression: string, escapeMarker: string = DEFAULT_ESCAPE_MARKER): ExpressionNode {
  return new Parser(expression, tokenize(expression, escapeMarker)).parse();
}
