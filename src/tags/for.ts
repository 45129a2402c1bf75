import type {
  TagCompiler,
} from '../types.js';

import {
  TemplateError,
  TemplateSyntaxError,
} from '../errors.js';

import {
  SafeString,
  markSafe,
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

const isIterable = (v: object): v is Iterable<unknown> => Symbol.iterator in v;

/**
 * Items to loop over:
 * - Arrays: as they are
 * - Strings (safe or not): their characters
 * - Maps: `[key, value]` pairs
 * - Other iterables: their items
 * - Plain objects: `[key, value]` pairs of their own enumerable keys
 * - Anything else: nothing
 *
 * @param value - Resolved sequence.
 */
export const toSequence = (value: unknown): unknown[] => {
  if (Array.isArray(value)) return value;
  if (typeof value === 'string' || value instanceof SafeString) return [ ...value.toString() ];
  if (value === null || typeof value !== 'object') return [];
  if (isIterable(value)) return Array.from(value);
  return Object.entries(value);
};

const itemLength = (item: unknown): number => {
  if (Array.isArray(item) || typeof item === 'string') return item.length;
  return 1;
};

export class ForNode extends Node {
  readonly kind = 'for';
  readonly loopvars: readonly string[];
  readonly sequence: FilterExpression;
  readonly isReversed: boolean;
  readonly nodelistLoop: NodeList;
  readonly nodelistEmpty: NodeList;

  constructor (loopvars: string[], sequence: FilterExpression, isReversed: boolean, nodelistLoop: NodeList, nodelistEmpty: NodeList | null = null) {
    super();
    this.loopvars = loopvars;
    this.sequence = sequence;
    this.isReversed = isReversed;
    this.nodelistLoop = nodelistLoop;
    this.nodelistEmpty = nodelistEmpty ?? new NodeList();
  }

  override childNodelists (): NodeList[] {
    return [ this.nodelistLoop, this.nodelistEmpty ];
  }

  override toString (): string {
    const reversed = this.isReversed ? ' reversed' : '';
    return `<ForNode: for ${this.loopvars.join(', ')} in ${this.sequence}${reversed}, tail_len: ${this.nodelistLoop.length}>`;
  }

  render (context: Context): SafeString {
    const parentloop = context.has('forloop') ? context.get('forloop') : {};
    return context.push().run(() => {
      const sequence = toSequence(this.sequence.resolve(context, true));
      const length = sequence.length;
      if (length < 1) {
        return this.nodelistEmpty.render(context);
      }
      const values = this.isReversed ? [ ...sequence ].reverse() : sequence;

      const unpack = this.loopvars.length > 1;
      let out = '';
      values.forEach((item, i) => {
        // parentloop is the enclosing loop's state, or {} at the top level
        const forloop = {
          counter0: i,
          counter: i + 1,
          revcounter: length - i,
          revcounter0: length - i - 1,
          first: i === 0,
          last: i === length - 1,
          parentloop,
        };
        context.set('forloop', forloop);

        if (unpack) {
          const len = itemLength(item);
          if (!Array.isArray(item) || len !== this.loopvars.length) {
            throw new TemplateError(`Need ${this.loopvars.length} values to unpack in for loop; got ${len}. `);
          }
          const unpacked: Record<string, unknown> = {};
          this.loopvars.forEach((name, j) => {
            unpacked[name] = item[j];
          });
          out += context.push(unpacked).run(() => this.nodelistLoop.render(context).toString());
        } else {
          context.set(this.loopvars[0], item);
          out += this.nodelistLoop.render(context).toString();
        }
      });
      return markSafe(out);
    });
  }
}

const invalidLoopvarChars = /[ "'|]/;

/**
 * `{% for x in items [reversed] %}...{% empty %}...{% endfor %}`; several
 * loop variables (`for k, v in pairs`) unpack each item.
 */
export const forTag: TagCompiler = (parser, token) => {
  const bits = token.splitContents();
  if (bits.length < 4) {
    throw new TemplateSyntaxError(`'for' statements should have at least four words: ${token.contents}`);
  }

  const isReversed = bits[bits.length - 1] === 'reversed';
  const inIndex = isReversed ? bits.length - 3 : bits.length - 2;
  if (bits[inIndex] !== 'in') {
    throw new TemplateSyntaxError(`'for' statements should use the format 'for x in y': ${token.contents}`);
  }

  const loopvars = bits.slice(1, inIndex).join(' ').split(/ *, */);
  for (const v of loopvars) {
    if (!v || invalidLoopvarChars.test(v)) {
      throw new TemplateSyntaxError(`'for' tag received an invalid argument: ${token.contents}`);
    }
  }

  const sequence = parser.compileFilter(bits[inIndex + 1]);
  const nodelistLoop = parser.parse([ 'empty', 'endfor' ]);
  let nodelistEmpty: NodeList | null = null;
  if (parser.nextToken().contents === 'empty') {
    nodelistEmpty = parser.parse([ 'endfor' ]);
    parser.deleteFirstToken();
  }
  return new ForNode(loopvars, sequence, isReversed, nodelistLoop, nodelistEmpty);
};
