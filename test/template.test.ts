import { assert } from 'chai';

import {
  TemplateSyntaxError,
  VariableDoesNotExist,
} from '../src/errors.js';
import type { AnnotatedError } from '../src/errors.js';
import { escapeHtml } from '../src/html-utils.js';
import {
  Engine,
  renderTemplate,
} from '../src/index.js';
import type { Context } from '../src/template-context.js';
import { Node } from '../src/template-nodes.js';
import {
  Origin,
  Template,
} from '../src/template.js';

class TemplateNameNode extends Node {
  readonly kind = 'templatename';

  render (context: Context): string {
    return context.templateName;
  }
}

/** Run `fn` and return what it throws. */
const thrown = (fn: () => unknown): AnnotatedError => {
  try {
    fn();
  } catch (err) {
    if (err instanceof Error) return err;
    throw err;
  }
  throw new Error('expected an error');
};

describe('Template', function () {
  describe('rendering', function () {
    it('escapes variables', function () {
      assert.strictEqual(renderTemplate('<p>{{ x }}</p>', { x: '<' }), '<p>&lt;</p>');
    });

    it('does not escape safe values twice', function () {
      assert.strictEqual(renderTemplate('{{ x|safe }}|{{ x|escape }}|{{ x|escape|escape }}', { x: '<i>' }), '<i>|&lt;i&gt;|&lt;i&gt;');
    });

    it('resolves dotted lookups', function () {
      assert.strictEqual(renderTemplate('{{ a.b.0 }}', { a: { b: [ 10 ] } }), '10');
    });

    it('renders invalid lookups with the configured string', function () {
      assert.strictEqual(renderTemplate('[{{ missing }}]'), '[]');
      assert.strictEqual(renderTemplate('[{{ missing }}]', {}, { stringIfInvalid: 'N/A' }), '[N/A]');
      assert.throws(() => renderTemplate('{{ missing }}', {}, { stringIfInvalid: null }), VariableDoesNotExist);
    });

    it('runs custom filters', function () {
      const out = renderTemplate('{{ x|upper|truncatechars:5 }}', { x: 'hello world' }, {
        builtins: false,
        filters: {
          upper: (v: unknown) => String(v).toUpperCase(),
          truncatechars: (v: unknown, n: unknown) => String(v).slice(0, Number(n)),
        },
      });
      assert.strictEqual(out, 'HELLO');
    });

    it('fails to compile unknown tags without builtins', function () {
      assert.throws(() => renderTemplate('{% if x %}{% endif %}', {}, { builtins: false }), TemplateSyntaxError, "Invalid block tag on line 1: 'if'");
    });

    it('compiles once and renders many times', function () {
      const engine = new Engine();
      const tpl = engine.fromString('{% for n in items %}{{ n }}{% endfor %}');
      assert.strictEqual(tpl.render(engine.makeContext({ items: [ 1, 2 ] })), '12');
      assert.strictEqual(tpl.render(engine.makeContext({ items: [ 3 ] })), '3');
      assert.strictEqual(renderTemplate(tpl, { items: [ 4, 5 ] }), '45');
    });

    it('sets the template name while rendering', function () {
      const engine = new Engine({
        tags: { templatename: () => new TemplateNameNode() },
        templates: { 'page.html': '{% templatename %}' },
      });
      assert.strictEqual(engine.renderToString('page.html'), 'page.html');
      assert.strictEqual(engine.fromString('{% templatename %}').render(engine.makeContext()), 'unknown');
    });
  });

  describe('origin', function () {
    it('records where the source came from', function () {
      const engine = new Engine({ templates: { 'page.html': 'x' } });
      const tpl = engine.getTemplate('page.html');
      assert.strictEqual(tpl.name, 'page.html');
      assert.strictEqual(tpl.origin.name, 'page.html');
      assert.strictEqual(tpl.origin.templateName, 'page.html');
      assert.strictEqual(tpl.origin.loaderName, 'locmem');
      assert.strictEqual(String(engine.fromString('x').origin), '<unknown source>');
    });

    it('compares by name and loader', function () {
      const a = new Origin('a.html');
      assert.isTrue(a.equals(new Origin('a.html', 'other')));
      assert.isFalse(a.equals(new Origin('b.html')));
      assert.isFalse(a.equals('a.html'));
    });
  });

  describe('debug information', function () {
    it('locates compile errors in the source', function () {
      const engine = new Engine({ debug: true });
      const err = thrown(() => engine.fromString('a\n{% bogus %}'));
      assert.instanceOf(err, TemplateSyntaxError);
      assert.deepEqual(err.templateDebug, {
        message: "Invalid block tag on line 2: 'bogus'. Did you forget to register or load this tag?",
        sourceLines: [ [ 1, 'a\n' ], [ 2, '{% bogus %}' ] ],
        before: '',
        during: '{% bogus %}',
        after: '',
        top: 1,
        bottom: 3,
        total: 3,
        line: 2,
        name: '<unknown source>',
        start: 2,
        end: 13,
      });
    });

    it('escapes the excerpt', function () {
      const engine = new Engine({ debug: true });
      const err = thrown(() => engine.fromString('<b>{{ x|bogus }}</b>'));
      assert.strictEqual(err.templateDebug?.before, '&lt;b&gt;');
      assert.strictEqual(err.templateDebug?.during, '{{ x|bogus }}');
      assert.strictEqual(err.templateDebug?.after, '&lt;/b&gt;');
    });

    it('locates render errors at the innermost node', function () {
      const engine = new Engine({ debug: true, stringIfInvalid: null });
      const tpl = engine.fromString('{% if True %}\n{{ missing }}{% endif %}');
      const err = thrown(() => tpl.render(engine.makeContext()));
      assert.instanceOf(err, VariableDoesNotExist);
      assert.strictEqual(err.templateDebug?.line, 2);
      assert.strictEqual(err.templateDebug?.during, '{{ missing }}');
    });

    it('is not attached outside debug mode', function () {
      const err = thrown(() => new Engine().fromString('a\n{% bogus %}'));
      assert.isUndefined(err.templateDebug);
    });
  });

  describe('fuzz/property-based', function () {
    function randStr (len: number): string {
      const chars = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789<>&\"'{}_- \n\täöü€";
      let s = '';
      for (let i = 0; i < len; i++) s += chars[Math.floor(Math.random() * chars.length)];
      return s;
    }

    it('escaped variables never leak raw HTML specials', function () {
      for (let i = 0; i < 50; i++) {
        const key = 'k' + i;
        const val = randStr(20);
        const out = renderTemplate(`[[{{ ${key} }}]]`, { [key]: val });
        assert.strictEqual(out, `[[${escapeHtml(val)}]]`);
      }
    });

    it('text outside tags is copied unchanged', function () {
      for (let i = 0; i < 50; i++) {
        const text = randStr(30).replace(/[{}]/g, '');
        assert.strictEqual(renderTemplate(text), text);
      }
    });
  });

  it('exposes the compiled node list', function () {
    const tpl = new Template('a{{ b }}', new Engine());
    assert.lengthOf(tpl.nodelist, 2);
    assert.strictEqual(tpl.source, 'a{{ b }}');
  });
});
