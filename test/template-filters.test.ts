import { assert } from 'chai';

import { createBuiltinLibrary } from '../src/builtins.js';
import {
  TemplateSyntaxError,
  VariableDoesNotExist,
} from '../src/errors.js';
import { isSafe } from '../src/html-utils.js';
import {
  Library,
  readFilterCallOptions,
  renderTemplate,
} from '../src/index.js';
import { Context } from '../src/template-context.js';
import { Parser } from '../src/template-parser.js';

const compile = (token: string) => new Parser([], createBuiltinLibrary()).compileFilter(token);

describe('FilterExpression', function () {
  describe('compiling', function () {
    it('splits a variable and its filter chain', function () {
      const fe = compile('name|default:"anon"|upper');
      assert.strictEqual(fe.var.var, 'name');
      assert.deepEqual(fe.filters.map((f) => f.filter.name), [ 'default', 'upper' ]);
      assert.isFalse(fe.filters[0].args[0].lookup);
      assert.lengthOf(fe.filters[1].args, 0);
      assert.strictEqual(String(fe), 'name|default:"anon"|upper');
    });

    it('accepts constants, numbers and lookup arguments', function () {
      assert.strictEqual(compile('"text"|upper').var.var, '"text"');
      assert.strictEqual(compile('_("text")').var.var, '_("text")');
      assert.strictEqual(compile('-1.5').var.literal, -1.5);
      const fe = compile('v|default:other.name');
      assert.isTrue(fe.filters[0].args[0].lookup);
      assert.strictEqual(fe.filters[0].args[0].variable.var, 'other.name');
    });

    it('allows whitespace around the pipe', function () {
      assert.deepEqual(compile('name | lower').filters.map((f) => f.filter.name), [ 'lower' ]);
    });

    it('rejects unknown filters', function () {
      assert.throws(() => compile('x|bogus'), TemplateSyntaxError, "Invalid filter: 'bogus'");
    });

    it('checks the number of arguments', function () {
      assert.throws(() => compile('x|upper:"a"'), TemplateSyntaxError, 'upper requires 1 arguments, 2 provided');
      assert.throws(() => compile('x|default'), TemplateSyntaxError, 'default requires 2 arguments, 1 provided');
      assert.doesNotThrow(() => compile('x|date'));
      assert.doesNotThrow(() => compile('x|date:"YYYY"'));
    });

    it('rejects text it cannot parse', function () {
      assert.throws(() => compile('x y'), TemplateSyntaxError, "Could not parse the remainder: ' y' from 'x y'");
      assert.throws(() => compile('x|upper junk|lower'), TemplateSyntaxError, 'Could not parse some characters: x|upper| junk||lower');
      assert.throws(() => compile('|upper'), TemplateSyntaxError, 'Could not find variable at start of |upper.');
    });
  });

  describe('resolving', function () {
    it('applies filters in order', function () {
      const fe = compile('name|lower|truncatechars:4');
      assert.strictEqual(fe.resolve(new Context({ name: 'ALPHABET' })), 'alp…');
    });

    it('returns null for a miss when failures are ignored', function () {
      assert.isNull(compile('missing').resolve(new Context(), true));
      assert.strictEqual(String(compile('missing|default:"x"').resolve(new Context(), true)), 'x');
    });

    it('passes null for a missing argument when failures are ignored', function () {
      const fe = compile('v|default:nope');
      assert.isNull(fe.resolve(new Context({ v: '' }), true));
      assert.strictEqual(fe.resolve(new Context({ v: '' })), '');
    });

    it('feeds an empty string through the filters by default', function () {
      assert.strictEqual(compile('missing|upper').resolve(new Context()), '');
      assert.strictEqual(renderTemplate('{{ missing|default:"none" }}'), 'none');
    });

    it('returns a non-empty invalid string without running filters', function () {
      assert.strictEqual(renderTemplate('{{ missing|upper }}', {}, { stringIfInvalid: 'n/a' }), 'n/a');
    });

    it('substitutes the variable text into %s', function () {
      assert.strictEqual(renderTemplate('{{ missing|upper }}', {}, { stringIfInvalid: 'INVALID(%s)' }), 'INVALID(missing)');
    });

    it('throws when the invalid string is null', function () {
      assert.throws(() => renderTemplate('{{ missing }}', {}, { stringIfInvalid: null }), VariableDoesNotExist);
      assert.throws(() => renderTemplate('{{ v|default:nope }}', { v: '' }, { stringIfInvalid: null }), VariableDoesNotExist);
    });

    it('resolves missing arguments to the invalid string', function () {
      assert.strictEqual(renderTemplate('{{ v|default:fallback }}', { v: '' }), '');
      assert.strictEqual(renderTemplate('{{ v|default:fallback }}', { v: '', fallback: 'z' }), 'z');
      assert.strictEqual(renderTemplate('{{ v|default:fallback }}', { v: '' }, { stringIfInvalid: 'n/a' }), 'n/a');
    });

    it('marks literal arguments safe but not looked up ones', function () {
      assert.strictEqual(renderTemplate('{{ v|default:"<b>" }}', { v: '' }), '<b>');
      assert.strictEqual(renderTemplate('{{ v|default:fb }}', { v: '', fb: '<b>' }), '&lt;b&gt;');
    });

    it('keeps safe input safe through isSafe filters', function () {
      const wrap = Object.assign((v: unknown) => `[${String(v)}]`, { isSafe: true });
      const plain = (v: unknown) => `[${String(v)}]`;
      const options = { filters: { wrap, plain } };
      assert.strictEqual(renderTemplate('{{ html|safe|wrap }}', { html: '<i>' }, options), '[<i>]');
      assert.strictEqual(renderTemplate('{{ html|wrap }}', { html: '<i>' }, options), '[&lt;i&gt;]');
      assert.strictEqual(renderTemplate('{{ html|safe|plain }}', { html: '<i>' }, options), '[&lt;i&gt;]');
    });

    it('passes the autoescape setting to filters that ask for it', function () {
      const mode = (v: unknown, options?: unknown) => (readFilterCallOptions(options).autoescape ? 'on' : 'off');
      const library = new Library().filter('mode', mode, { needsAutoescape: true });
      assert.strictEqual(library.filters.get('mode')?.maxArgs, 0);
      const tpl = '{{ x|mode }}{% autoescape off %}{{ x|mode }}{% endautoescape %}';
      assert.strictEqual(renderTemplate(tpl, { x: 1 }, { libraries: [ library ] }), 'onoff');
    });

    it('converts dates to the context zone for filters that expect local time', function () {
      const data = { d: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)) };
      assert.strictEqual(renderTemplate('{{ d|date:"HH:mm" }}', data), '03:04');
      assert.strictEqual(renderTemplate('{{ d|date:"HH:mm" }}', data, { useTz: true, timeZone: 'Europe/Berlin' }), '04:04');
    });

    it('returns safe values from safe filters', function () {
      const value = compile('"<b>"|escape').resolve(new Context());
      assert.isTrue(isSafe(value));
      assert.strictEqual(String(value), '<b>');
      assert.strictEqual(String(compile('v|escape').resolve(new Context({ v: '<b>' }))), '&lt;b&gt;');
    });
  });
});
