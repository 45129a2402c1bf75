import type {
  TagCompiler,
} from '../types.js';

import {
  TemplateSyntaxError,
} from '../errors.js';

import {
  markSafe,
} from '../html-utils.js';

import type {
  SafeString,
} from '../html-utils.js';

import type {
  Context,
} from '../template-context.js';

import {
  Node,
  NodeList,
} from '../template-nodes.js';

export class AutoEscapeControlNode extends Node {
  readonly kind = 'autoescape';
  readonly setting: boolean;
  readonly nodelist: NodeList;

  constructor (setting: boolean, nodelist: NodeList) {
    super();
    this.setting = setting;
    this.nodelist = nodelist;
  }

  override childNodelists (): NodeList[] {
    return [ this.nodelist ];
  }

  render (context: Context): SafeString | string {
    const previous = context.autoescape;
    context.autoescape = this.setting;
    let output: string;
    try {
      output = this.nodelist.render(context).toString();
    } finally {
      context.autoescape = previous;
    }
    return this.setting ? markSafe(output) : output;
  }
}

/**
 * `{% autoescape on|off %}...{% endautoescape %}`
 */
export const autoescapeTag: TagCompiler = (parser, token) => {
  const args = token.contents.split(/\s+/);
  if (args.length !== 2) {
    throw new TemplateSyntaxError("'autoescape' tag requires exactly one argument.");
  }
  const arg = args[1];
  if (arg !== 'on' && arg !== 'off') {
    throw new TemplateSyntaxError("'autoescape' argument should be 'on' or 'off'");
  }
  const nodelist = parser.parse([ 'endautoescape' ]);
  parser.deleteFirstToken();
  return new AutoEscapeControlNode(arg === 'on', nodelist);
};
