import type {
  TagCompiler,
} from '../types.js';

import {
  Context,
} from '../template-context.js';

import {
  Node,
} from '../template-nodes.js';

export class VerbatimNode extends Node {
  readonly kind = 'verbatim';
  readonly content: string;

  constructor (content: string) {
    super();
    this.content = content;
  }

  render (): string {
    return this.content;
  }
}

/**
 * `{% verbatim %}{{ not rendered }}{% endverbatim %}`. A name after the tag
 * (`{% verbatim raw %}`) must be repeated on the closing tag, which allows
 * `{% endverbatim %}` itself to appear inside.
 */
export const verbatimTag: TagCompiler = (parser) => {
  // the lexer turns everything up to the closing tag into text tokens
  const nodelist = parser.parse([ 'endverbatim' ]);
  parser.deleteFirstToken();
  return new VerbatimNode(nodelist.render(new Context()).toString());
};
