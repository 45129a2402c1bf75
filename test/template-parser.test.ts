import { assert } from 'chai';

import { createBuiltinLibrary } from '../src/builtins.js';
import {
  TemplateSyntaxError,
  errorToken,
} from '../src/errors.js';
import {
  Engine,
  Library,
  renderTemplate,
} from '../src/index.js';
import type { Context } from '../src/template-context.js';
import { tokenize } from '../src/template-lexer.js';
import {
  Node,
  NodeList,
  TextNode,
} from '../src/template-nodes.js';
import {
  Parser,
  tokenKwargs,
} from '../src/template-parser.js';
import type { TagCompiler } from '../src/types.js';

class ShoutNode extends Node {
  readonly kind = 'shout';
  readonly nodelist: NodeList;

  constructor (nodelist: NodeList) {
    super();
    this.nodelist = nodelist;
  }

  override childNodelists (): NodeList[] {
    return [ this.nodelist ];
  }

  render (context: Context): string {
    return this.nodelist.render(context).toString().toUpperCase();
  }
}

const shoutTag: TagCompiler = (parser) => {
  const nodelist = parser.parse([ 'endshout' ]);
  parser.deleteFirstToken();
  return new ShoutNode(nodelist);
};

const parse = (source: string) => new Parser(tokenize(source), createBuiltinLibrary()).parse();

/** Run `fn` and return the TemplateSyntaxError it throws. */
const syntaxError = (fn: () => unknown): TemplateSyntaxError => {
  try {
    fn();
  } catch (err) {
    if (err instanceof TemplateSyntaxError) return err;
    throw err;
  }
  throw new Error('expected a TemplateSyntaxError');
};

describe('Parser', function () {
  it('builds text and variable nodes', function () {
    const nodelist = parse('<p>{{ x }}</p>');
    assert.deepEqual(nodelist.items.map(String), [ '<TextNode: "<p>">', '<Variable Node: x>', '<TextNode: "</p>">' ]);
    assert.isTrue(nodelist.containsNontext);
  });

  it('records the token and origin on each node', function () {
    const nodelist = parse('a\n{{ x }}');
    const node = nodelist.items[1];
    assert.instanceOf(node, Node);
    if (node instanceof Node) {
      assert.strictEqual(node.token?.lineno, 2);
      assert.isNull(node.origin);
    }
  });

  it('drops comments', function () {
    assert.strictEqual(renderTemplate('a{# hidden #}b'), 'ab');
  });

  it('rejects empty tags', function () {
    assert.strictEqual(syntaxError(() => parse('{{ }}')).message, 'Empty variable tag on line 1');
    assert.strictEqual(syntaxError(() => parse('x\n{% %}')).message, 'Empty block tag on line 2');
  });

  it('rejects unknown block tags', function () {
    const err = syntaxError(() => parse('{% frobnicate %}'));
    assert.strictEqual(err.message, "Invalid block tag on line 1: 'frobnicate'. Did you forget to register or load this tag?");
  });

  it('names the expected end tags for an unknown tag inside a block', function () {
    const err = syntaxError(() => parse('{% if x %}{% frob %}{% endif %}'));
    assert.strictEqual(err.message, "Invalid block tag on line 1: 'frob', expected 'elif', 'else' or 'endif'. Did you forget to register or load this tag?");
  });

  it('reports the innermost unclosed tag and its line', function () {
    const err = syntaxError(() => parse('a\n{% if x %}\nb'));
    assert.strictEqual(err.message, "Unclosed tag on line 2: 'if'. Looking for one of: elif, else, endif.");
    assert.strictEqual(errorToken(err)?.lineno, 2);

    const nested = syntaxError(() => parse('{% if a %}{% for x in y %}'));
    assert.strictEqual(nested.message, "Unclosed tag on line 1: 'for'. Looking for one of: empty, endfor.");
  });

  it('reports an unclosed skipped section', function () {
    const err = syntaxError(() => parse('{% comment %}abc'));
    assert.strictEqual(err.message, "Unclosed tag on line 1: 'comment'. Looking for one of: endcomment.");
  });

  it('annotates errors with the innermost token', function () {
    const err = syntaxError(() => parse('{% if x %}\n{{ a|bogus }}{% endif %}'));
    assert.strictEqual(err.message, "Invalid filter: 'bogus'");
    assert.strictEqual(errorToken(err)?.contents, 'a|bogus');
    assert.strictEqual(errorToken(err)?.lineno, 2);
  });

  it('annotates errors of any type thrown by tag compilers', function () {
    const library = new Library().tag('boom', () => {
      throw new RangeError('boom');
    });
    const parser = new Parser(tokenize('x\n{% boom %}'), library);
    try {
      parser.parse();
      assert.fail('expected an error');
    } catch (err) {
      assert.instanceOf(err, RangeError);
      if (err instanceof RangeError) assert.strictEqual(errorToken(err)?.contents, 'boom');
    }
  });

  it('enforces tags that must come first', function () {
    const err = syntaxError(() => parse('{% if x %}{% endif %}{% extends "base.html" %}'));
    assert.strictEqual(err.message, '<ExtendsNode: extends "base.html"> must be the first tag in the template.');
    assert.doesNotThrow(() => parse('text first {% extends "base.html" %}'));
  });

  it('compiles custom tags that consume their own end tag', function () {
    const engine = new Engine({ tags: { shout: shoutTag } });
    const tpl = engine.fromString('{% shout %}hi {{ name }}{% endshout %}!');
    assert.strictEqual(tpl.render(engine.makeContext({ name: 'ada' })), 'HI ADA!');
  });

  it('accepts several nodes from one tag', function () {
    const pair: TagCompiler = () => [ new TextNode('a'), new TextNode('b') ];
    const parser = new Parser(tokenize('{% pair %}'), new Library().tag('pair', pair));
    assert.lengthOf(parser.parse(), 2);
  });

  it('lets later libraries override earlier ones', function () {
    const parser = new Parser([], createBuiltinLibrary());
    parser.addLibrary(new Library().filter('upper', (v: unknown) => `up:${String(v)}`));
    assert.strictEqual(parser.findFilter('upper').fn('x'), 'up:x');
  });

  it('finds nodes by kind in document order', function () {
    const nodelist = parse('{{ a }}{% if b %}{{ c }}{% else %}{% for x in y %}{{ d }}{% endfor %}{% endif %}');
    const tokens = nodelist.getNodesByType('variable').map((n) => n.token?.contents);
    assert.deepEqual(tokens, [ 'a', 'c', 'd' ]);
    assert.lengthOf(nodelist.getNodesByType('for'), 1);
  });

  it('fails on running out of tokens', function () {
    const parser = new Parser([]);
    assert.isFalse(parser.hasTokens);
    assert.throws(() => parser.nextToken(), TemplateSyntaxError, 'Unexpected end of template');
  });

  describe('tokenKwargs', function () {
    const parser = new Parser([], createBuiltinLibrary());

    it('reads name=value pairs and leaves the rest', function () {
      const bits = [ 'a=1', 'b=x|upper', 'only' ];
      const kwargs = tokenKwargs(bits, parser);
      assert.deepEqual([ ...kwargs.keys() ], [ 'a', 'b' ]);
      assert.strictEqual(kwargs.get('b')?.token, 'x|upper');
      assert.deepEqual(bits, [ 'only' ]);
    });

    it('reads the legacy as form when allowed', function () {
      const bits = [ 'x', 'as', 'y', 'and', 'z', 'as', 'w' ];
      const kwargs = tokenKwargs(bits, parser, true);
      assert.deepEqual([ ...kwargs.keys() ], [ 'y', 'w' ]);
      assert.deepEqual(bits, []);
      assert.strictEqual(tokenKwargs([ 'x', 'as', 'y' ], parser, false).size, 0);
    });

    it('returns nothing for bits that are not keyword arguments', function () {
      const bits = [ 'plain' ];
      assert.strictEqual(tokenKwargs(bits, parser).size, 0);
      assert.deepEqual(bits, [ 'plain' ]);
    });
  });
});
