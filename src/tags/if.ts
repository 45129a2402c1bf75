import type {
  TagCompiler,
} from '../types.js';

import {
  TemplateSyntaxError,
  VariableDoesNotExist,
} from '../errors.js';

import {
  SafeString,
} from '../html-utils.js';

import type {
  Context,
} from '../template-context.js';

import type {
  FilterExpression,
} from '../template-filters.js';

import {
  Node,
  NodeList,
} from '../template-nodes.js';

import type {
  Parser,
} from '../template-parser.js';

export type IfCompareOp = '==' | '!=' | '<' | '>' | '<=' | '>=' | 'in' | 'not in';

/**
 * Parsed `{% if %}` condition.
 */
export type IfCondition =
  | { type: 'operand'; value: FilterExpression }
  | { type: 'not'; node: IfCondition }
  | { type: 'and'; nodes: IfCondition[] }
  | { type: 'or'; nodes: IfCondition[] }
  | { type: 'compare'; op: IfCompareOp; left: IfCondition; right: IfCondition };

type Tok =
  | { t: 'and' | 'or' | 'not'; text: string }
  | { t: 'comp'; v: IfCompareOp }
  | { t: 'operand'; text: string };

const compareOps: ReadonlySet<string> = new Set([ '==', '!=', '<', '>', '<=', '>=', 'in' ]);

const isCompareOp = (s: string): s is IfCompareOp => compareOps.has(s) || s === 'not in';

/**
 * Classify the bits of an if tag; `not in` becomes a single operator.
 */
const lex = (bits: string[]): Tok[] => {
  const tokens: Tok[] = [];
  for (let i = 0; i < bits.length; i++) {
    const bit = bits[i];
    if (bit === 'not' && bits[i + 1] === 'in') {
      tokens.push({ t: 'comp', v: 'not in' });
      i++;
    } else if (bit === 'and' || bit === 'or' || bit === 'not') {
      tokens.push({ t: bit, text: bit });
    } else if (isCompareOp(bit)) {
      tokens.push({ t: 'comp', v: bit });
    } else {
      tokens.push({ t: 'operand', text: bit });
    }
  }
  return tokens;
};

const tokText = (tok: Tok): string => (tok.t === 'comp') ? tok.v : tok.text;

/**
 * Parse an if condition. Precedence, loosest first: `or`, `and`, `not`,
 * then one comparison or membership test between two operands.
 *
 * @param bits - Tag bits after the tag name.
 * @param parser - Compiles the operands as filter expressions.
 * @throws TemplateSyntaxError for malformed conditions.
 */
export const parseCondition = (bits: string[], parser: Parser): IfCondition => {
  const tokens = lex(bits);
  let p = 0;

  /** Peek at the current token without consuming it. */
  function peek (): Tok | undefined {
    return tokens[p];
  }

  /** Consume and return the current token. */
  function eat (): Tok | undefined {
    const t = tokens[p];
    p++;
    return t;
  }

  /** Parse a single filter expression. */
  function parseOperand (): IfCondition {
    const t = eat();
    if (!t) {
      throw new TemplateSyntaxError('Unexpected end of expression in if tag.');
    }
    if (t.t !== 'operand') {
      throw new TemplateSyntaxError(`Not expecting '${tokText(t)}' in this position in if tag.`);
    }
    return { type: 'operand', value: parser.compileFilter(t.text) };
  }

  /** Parse an optional comparison (`left <op> right`). */
  function parseCompare (): IfCondition {
    const left = parseOperand();
    const nxt = peek();
    if (nxt?.t === 'comp') {
      eat();
      return { type: 'compare', op: nxt.v, left, right: parseOperand() };
    }
    return left;
  }

  /** Parse leading `not`s applied to a comparison. */
  function parseUnary (): IfCondition {
    if (peek()?.t === 'not') {
      eat();
      return { type: 'not', node: parseUnary() };
    }
    return parseCompare();
  }

  /** Parse a sequence of unary nodes joined by AND. */
  function parseAnd (): IfCondition {
    const nodes: IfCondition[] = [ parseUnary() ];
    while (peek()?.t === 'and') {
      eat();
      nodes.push(parseUnary());
    }
    return (nodes.length === 1) ? nodes[0] : { type: 'and', nodes };
  }

  /** Parse a sequence of AND nodes joined by OR. */
  function parseOr (): IfCondition {
    const nodes: IfCondition[] = [ parseAnd() ];
    while (peek()?.t === 'or') {
      eat();
      nodes.push(parseAnd());
    }
    return (nodes.length === 1) ? nodes[0] : { type: 'or', nodes };
  }

  const condition = parseOr();
  const rest = peek();
  if (rest) {
    throw new TemplateSyntaxError(`Unused '${tokText(rest)}' at end of if expression.`);
  }
  return condition;
};

const unwrap = (v: unknown): unknown => (v instanceof SafeString) ? v.toString() : v;

const isPlainObject = (v: unknown): v is Record<string, unknown> => {
  if (v === null || typeof v !== 'object') return false;
  const proto = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
};

/**
 * Truthiness for control flow:
 * - Arrays and strings (safe or not): true if non-empty
 * - Maps and Sets: true if non-empty
 * - Plain objects: true if they have at least one own key
 * - Other values: Boolean coercion
 *
 * @param v - Value to test.
 */
export const isTruthy = (v: unknown): boolean => {
  if (Array.isArray(v) || v instanceof SafeString) return v.length > 0;
  if (v instanceof Map || v instanceof Set) return v.size > 0;
  if (isPlainObject(v)) return Object.keys(v).length > 0;
  return Boolean(v);
};

const equals = (a: unknown, b: unknown): boolean => {
  const l = unwrap(a);
  const r = unwrap(b);
  if (l === undefined || r === undefined) return (l ?? null) === (r ?? null);
  return l === r;
};

const compareWith = <T extends number | string>(l: T, r: T, op: '<' | '>' | '<=' | '>='): boolean => {
  switch (op) {
    case '<': return l < r;
    case '>': return l > r;
    case '<=': return l <= r;
    case '>=': return l >= r;
  }
};

/**
 * Ordering is only defined between two numbers or two strings; anything
 * else compares false.
 */
const order = (a: unknown, b: unknown, op: '<' | '>' | '<=' | '>='): boolean => {
  const l = unwrap(a);
  const r = unwrap(b);
  if (typeof l === 'number' && typeof r === 'number') return compareWith(l, r, op);
  if (typeof l === 'string' && typeof r === 'string') return compareWith(l, r, op);
  return false;
};

const contains = (container: unknown, item: unknown): boolean => {
  const c = unwrap(container);
  const i = unwrap(item);
  if (typeof c === 'string') return typeof i === 'string' && c.includes(i);
  if (Array.isArray(c)) return c.some((el) => equals(el, i));
  if (c instanceof Map || c instanceof Set) return c.has(i);
  if (isPlainObject(c)) return typeof i === 'string' && Object.prototype.hasOwnProperty.call(c, i);
  return false;
};

/**
 * Evaluate a condition. Operands that fail to resolve count as null.
 */
export const evaluateCondition = (condition: IfCondition, context: Context): unknown => {
  switch (condition.type) {
    case 'operand':
      return condition.value.resolve(context, true);
    case 'not':
      return !isTruthy(evaluateCondition(condition.node, context));
    case 'and': {
      for (const c of condition.nodes) {
        if (!isTruthy(evaluateCondition(c, context))) return false;
      }
      return true;
    }
    case 'or': {
      for (const c of condition.nodes) {
        if (isTruthy(evaluateCondition(c, context))) return true;
      }
      return false;
    }
    case 'compare': {
      const left = evaluateCondition(condition.left, context);
      const right = evaluateCondition(condition.right, context);
      switch (condition.op) {
        case '==': return equals(left, right);
        case '!=': return !equals(left, right);
        case 'in': return contains(right, left);
        case 'not in': return !contains(right, left);
        default: return order(left, right, condition.op);
      }
    }
  }
};

/** One `if`/`elif` branch, or the `else` branch when `condition` is null. */
export type IfBranch = [IfCondition | null, NodeList];

export class IfNode extends Node {
  readonly kind = 'if';
  readonly branches: readonly IfBranch[];

  constructor (branches: IfBranch[]) {
    super();
    this.branches = branches;
  }

  override childNodelists (): NodeList[] {
    return this.branches.map(([ , nodelist ]) => nodelist);
  }

  render (context: Context): SafeString | string {
    for (const [ condition, nodelist ] of this.branches) {
      if (condition === null || isTruthy(this.test(condition, context))) {
        return nodelist.render(context);
      }
    }
    return '';
  }

  /** A lookup miss anywhere in the condition makes it false. */
  private test (condition: IfCondition, context: Context): unknown {
    try {
      return evaluateCondition(condition, context);
    } catch (err) {
      if (err instanceof VariableDoesNotExist) return null;
      throw err;
    }
  }
}

const commandOf = (contents: string): string => contents.split(/\s+/)[0];

/**
 * `{% if a %}...{% elif b %}...{% else %}...{% endif %}`
 */
export const ifTag: TagCompiler = (parser, token) => {
  const branches: IfBranch[] = [];

  const condition = parseCondition(token.splitContents().slice(1), parser);
  branches.push([ condition, parser.parse([ 'elif', 'else', 'endif' ]) ]);

  let next = parser.nextToken();
  while (commandOf(next.contents) === 'elif') {
    const elifCondition = parseCondition(next.splitContents().slice(1), parser);
    branches.push([ elifCondition, parser.parse([ 'elif', 'else', 'endif' ]) ]);
    next = parser.nextToken();
  }

  if (next.contents === 'else') {
    branches.push([ null, parser.parse([ 'endif' ]) ]);
    next = parser.nextToken();
  }

  if (next.contents !== 'endif') {
    throw new TemplateSyntaxError(`Malformed template tag at line ${next.lineno}: "${next.contents}"`);
  }
  return new IfNode(branches);
};
