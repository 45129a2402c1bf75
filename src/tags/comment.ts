import type {
  TagCompiler,
} from '../types.js';

import {
  Node,
} from '../template-nodes.js';

export class CommentNode extends Node {
  readonly kind = 'comment';

  render (): string {
    return '';
  }
}

/**
 * `{% comment %}...{% endcomment %}`: everything in between is dropped
 * without being compiled.
 */
export const commentTag: TagCompiler = (parser) => {
  parser.skipPast('endcomment');
  return new CommentNode();
};
