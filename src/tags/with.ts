import type {
  TagCompiler,
} from '../types.js';

import {
  TemplateSyntaxError,
} from '../errors.js';

import type {
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

import {
  tokenKwargs,
} from '../template-parser.js';

export class WithNode extends Node {
  readonly kind = 'with';
  readonly extraContext: ReadonlyMap<string, FilterExpression>;
  readonly nodelist: NodeList;

  constructor (extraContext: Map<string, FilterExpression>, nodelist: NodeList) {
    super();
    this.extraContext = extraContext;
    this.nodelist = nodelist;
  }

  override childNodelists (): NodeList[] {
    return [ this.nodelist ];
  }

  override toString (): string {
    return `<WithNode: ${[ ...this.extraContext.keys() ].join(', ')}>`;
  }

  render (context: Context): SafeString {
    const values: Record<string, unknown> = {};
    for (const [ key, value ] of this.extraContext) {
      values[key] = value.resolve(context);
    }
    return context.push(values).run(() => this.nodelist.render(context));
  }
}

/**
 * `{% with total=items|length %}...{% endwith %}`, or the older
 * `{% with items|length as total %}`.
 */
export const withTag: TagCompiler = (parser, token) => {
  const bits = token.splitContents();
  const remaining = bits.slice(1);
  const extraContext = tokenKwargs(remaining, parser, true);
  if (extraContext.size === 0) {
    throw new TemplateSyntaxError(`'${bits[0]}' expected at least one variable assignment`);
  }
  if (remaining.length > 0) {
    throw new TemplateSyntaxError(`'${bits[0]}' received an invalid token: '${remaining[0]}'`);
  }
  const nodelist = parser.parse([ 'endwith' ]);
  parser.deleteFirstToken();
  return new WithNode(extraContext, nodelist);
};
