import type { Engine } from './engine.js';

import type { TemplateLoader } from './loaders.js';

import {
  annotateTemplateDebug,
  errorToken,
} from './errors.js';

import type {
  TemplateDebugInfo,
} from './errors.js';

import {
  escapeHtml,
} from './html-utils.js';

import type {
  Context,
} from './template-context.js';

import {
  tokenize,
} from './template-lexer.js';

import type {
  Token,
} from './template-lexer.js';

import type {
  NodeList,
} from './template-nodes.js';

import {
  Parser,
} from './template-parser.js';

export const UNKNOWN_SOURCE = '<unknown source>';

/** Lines of source shown on each side of a failing line. */
const CONTEXT_LINES = 10;

/**
 * Where a template's source came from.
 */
export class Origin {
  readonly name: string;
  readonly templateName: string | null;
  readonly loader: TemplateLoader | null;

  constructor (name: string, templateName: string | null = null, loader: TemplateLoader | null = null) {
    this.name = name;
    this.templateName = templateName;
    this.loader = loader;
  }

  get loaderName (): string | null {
    return this.loader ? this.loader.name : null;
  }

  equals (other: unknown): boolean {
    return other instanceof Origin && this.name === other.name && this.loader === other.loader;
  }

  toString (): string {
    return this.name;
  }
}

export interface TemplateInit {
  name?: string | null;
  origin?: Origin | null;
}

/**
 * Offsets at which lines start, preceded by a 0 for a dummy line 0 and
 * followed by the end of the source plus one.
 */
const linebreaks = (source: string): number[] => {
  const breaks = [ 0 ];
  for (let p = source.indexOf('\n'); p >= 0; p = source.indexOf('\n', p + 1)) {
    breaks.push(p + 1);
  }
  breaks.push(source.length + 1);
  return breaks;
};

/**
 * A compiled template.
 *
 * @example
 * const engine = new Engine();
 * const tpl = new Template('Hello {{ name }}!', engine);
 * tpl.render(engine.makeContext({ name: 'World' })); // 'Hello World!'
 */
export class Template {
  readonly source: string;
  readonly engine: Engine;
  readonly name: string | null;
  readonly origin: Origin;
  readonly nodelist: NodeList;

  constructor (source: string, engine: Engine, init: TemplateInit = {}) {
    this.source = String(source);
    this.engine = engine;
    this.name = init.name ?? null;
    this.origin = init.origin ?? new Origin(UNKNOWN_SOURCE);
    this.nodelist = this.compileNodelist();
  }

  /**
   * Render against `context`. The context is bound to this template for the
   * duration unless an outer template already holds it.
   */
  render (context: Context): string {
    return context.renderContext.pushState(this, () => {
      if (context.template === null) {
        return context.bindTemplate(this, () => {
          context.templateName = this.name ?? 'unknown';
          return this.renderNodelist(context);
        });
      }
      return this.renderNodelist(context);
    });
  }

  renderNodelist (context: Context): string {
    return this.nodelist.render(context).toString();
  }

  /**
   * Source lines around the token that caused `error`, for debug output.
   *
   * @param error - The failure.
   * @param token - Token being compiled or rendered; needs a position.
   */
  getExceptionInfo (error: Error, token: Token | null): TemplateDebugInfo {
    const [ start, end ] = token?.position ?? [ 0, 0 ];
    let line = 0;
    let upto = 0;
    let before = '';
    let during = '';
    let after = '';
    const sourceLines: [number, string][] = [];

    linebreaks(this.source).forEach((next, num) => {
      if (start >= upto && end <= next) {
        line = num;
        before = escapeHtml(this.source.slice(upto, start));
        during = escapeHtml(this.source.slice(start, end));
        after = escapeHtml(this.source.slice(end, next));
      }
      sourceLines.push([ num, escapeHtml(this.source.slice(upto, next)) ]);
      upto = next;
    });

    const total = sourceLines.length;
    const top = Math.max(1, line - CONTEXT_LINES);
    const bottom = Math.min(total, line + 1 + CONTEXT_LINES);

    return {
      message: error.message || '(Could not get exception message)',
      sourceLines: sourceLines.slice(top, bottom),
      before,
      during,
      after,
      top,
      bottom,
      total,
      line,
      name: this.origin.name,
      start,
      end,
    };
  }

  private compileNodelist (): NodeList {
    const tokens = tokenize(this.source, this.engine.debug);
    const parser = new Parser(tokens, {}, this.origin);
    for (const library of this.engine.templateLibraries) {
      parser.addLibrary(library);
    }
    try {
      return parser.parse();
    } catch (err) {
      if (err instanceof Error && this.engine.debug) {
        const token = errorToken(err);
        if (token) annotateTemplateDebug(err, this.getExceptionInfo(err, token));
      }
      throw err;
    }
  }
}
