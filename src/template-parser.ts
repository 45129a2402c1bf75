import type { Origin } from './template.js';

import type {
  RegisteredFilter,
  TagCompiler,
} from './types.js';

import {
  TemplateSyntaxError,
  annotateToken,
} from './errors.js';

import type {
  AnnotatedError,
} from './errors.js';

import {
  FilterExpression,
} from './template-filters.js';

import type {
  Token,
} from './template-lexer.js';

import {
  Node,
  NodeList,
  TextNode,
  VariableNode,
} from './template-nodes.js';

import {
  getTextList,
} from './text-utils.js';

/**
 * Tags and filters a parser can compile. A `Library` satisfies this.
 */
export interface TemplateRegistry {
  tags?: ReadonlyMap<string, TagCompiler>;
  filters?: ReadonlyMap<string, RegisteredFilter>;
}

/**
 * Turns a token stream into a node tree, dispatching block tags to the
 * registered tag compilers.
 */
export class Parser {
  /** Remaining tokens, stored last-first. */
  private readonly tokens: Token[];
  readonly tags = new Map<string, TagCompiler>();
  readonly filters = new Map<string, RegisteredFilter>();
  /** Open block tags, innermost last. */
  readonly commandStack: [string, Token][] = [];
  readonly origin: Origin | null;
  /** Names of `{% block %}` tags seen so far; used to reject duplicates. */
  readonly loadedBlocks = new Set<string>();

  constructor (tokens: Token[], registry: TemplateRegistry = {}, origin: Origin | null = null) {
    this.tokens = [ ...tokens ].reverse();
    this.origin = origin;
    this.addLibrary(registry);
  }

  get hasTokens (): boolean {
    return this.tokens.length > 0;
  }

  /**
   * Compile tokens until one of the `parseUntil` block tags is reached. The
   * terminating token is put back for the caller to consume.
   *
   * @param parseUntil - Block tag names that end this node list.
   * @throws TemplateSyntaxError for invalid or unclosed tags.
   */
  parse (parseUntil: readonly string[] = []): NodeList {
    const nodelist = new NodeList();
    while (this.tokens.length > 0) {
      const token = this.nextToken();

      if (token.type === 'text') {
        this.extendNodelist(nodelist, new TextNode(token.contents), token);
      } else if (token.type === 'var') {
        if (!token.contents) {
          throw this.error(token, `Empty variable tag on line ${token.lineno}`);
        }
        let filterExpression: FilterExpression;
        try {
          filterExpression = this.compileFilter(token.contents);
        } catch (err) {
          throw this.error(token, err);
        }
        this.extendNodelist(nodelist, new VariableNode(filterExpression), token);
      } else if (token.type === 'block') {
        const command = token.contents.split(/\s+/)[0];
        if (!command) {
          throw this.error(token, `Empty block tag on line ${token.lineno}`);
        }
        if (parseUntil.includes(command)) {
          this.prependToken(token);
          return nodelist;
        }
        this.commandStack.push([ command, token ]);
        const compile = this.tags.get(command);
        if (compile === undefined) {
          throw this.invalidBlockTag(token, command, parseUntil);
        }
        let compiled: Node | Node[];
        try {
          compiled = compile(this, token);
        } catch (err) {
          throw this.error(token, err);
        }
        for (const node of Array.isArray(compiled) ? compiled : [ compiled ]) {
          this.extendNodelist(nodelist, node, token);
        }
        this.commandStack.pop();
      }
      // comment tokens produce nothing
    }
    if (parseUntil.length > 0) {
      throw this.unclosedBlockTag(parseUntil);
    }
    return nodelist;
  }

  /**
   * Discard tokens up to and including the block tag `endtag`.
   *
   * @throws TemplateSyntaxError if `endtag` never appears.
   */
  skipPast (endtag: string): void {
    while (this.tokens.length > 0) {
      const token = this.nextToken();
      if (token.type === 'block' && token.contents === endtag) return;
    }
    throw this.unclosedBlockTag([ endtag ]);
  }

  /**
   * Append `node`, recording its token and origin.
   *
   * @throws TemplateSyntaxError when a `mustBeFirst` node follows other tags.
   */
  extendNodelist (nodelist: NodeList, node: Node, token: Token): void {
    if (node.mustBeFirst && nodelist.containsNontext) {
      throw this.error(token, `${node} must be the first tag in the template.`);
    }
    if (!(node instanceof TextNode)) {
      nodelist.containsNontext = true;
    }
    node.token = token;
    node.origin = this.origin;
    nodelist.push(node);
  }

  /**
   * An error annotated with `token`, unless it already carries one (the
   * innermost failure wins when parsing recurses). Strings and non-errors
   * become TemplateSyntaxErrors.
   */
  error (token: Token, e: unknown): AnnotatedError {
    const err = (e instanceof Error) ? e : new TemplateSyntaxError(String(e));
    return annotateToken(err, token);
  }

  invalidBlockTag (token: Token, command: string, parseUntil: readonly string[] = []): AnnotatedError {
    if (parseUntil.length > 0) {
      const expected = getTextList(parseUntil.map((p) => `'${p}'`), 'or');
      return this.error(
        token,
        `Invalid block tag on line ${token.lineno}: '${command}', expected ${expected}. Did you forget to register or load this tag?`,
      );
    }
    return this.error(
      token,
      `Invalid block tag on line ${token.lineno}: '${command}'. Did you forget to register or load this tag?`,
    );
  }

  /**
   * Error for the innermost open block tag.
   */
  unclosedBlockTag (parseUntil: readonly string[]): AnnotatedError {
    const open = this.commandStack.pop();
    if (open === undefined) {
      return new TemplateSyntaxError(`Unclosed tag. Looking for one of: ${parseUntil.join(', ')}.`);
    }
    const [ command, token ] = open;
    return this.error(
      token,
      `Unclosed tag on line ${token.lineno}: '${command}'. Looking for one of: ${parseUntil.join(', ')}.`,
    );
  }

  /**
   * Take the next token.
   *
   * @throws TemplateSyntaxError when no tokens are left.
   */
  nextToken (): Token {
    const token = this.tokens.pop();
    if (token === undefined) {
      throw new TemplateSyntaxError('Unexpected end of template');
    }
    return token;
  }

  prependToken (token: Token): void {
    this.tokens.push(token);
  }

  deleteFirstToken (): void {
    this.tokens.pop();
  }

  /**
   * Make the tags and filters of `library` available, overriding earlier
   * registrations of the same name.
   */
  addLibrary (library: TemplateRegistry): void {
    for (const [ name, compiler ] of library.tags ?? []) this.tags.set(name, compiler);
    for (const [ name, filter ] of library.filters ?? []) this.filters.set(name, filter);
  }

  compileFilter (token: string): FilterExpression {
    return new FilterExpression(token, this);
  }

  /**
   * @throws TemplateSyntaxError for unknown filters.
   */
  findFilter (name: string): RegisteredFilter {
    const filter = this.filters.get(name);
    if (filter === undefined) {
      throw new TemplateSyntaxError(`Invalid filter: '${name}'`);
    }
    return filter;
  }
}

const reKwarg = /^(?:(\w+)=)?(.+)$/s;

/**
 * Parse keyword arguments (`name=value`) from the front of `bits`, removing
 * the ones consumed. With `supportLegacy`, `value as name [and ...]` is
 * accepted too. Stops at the first bit that does not fit the format.
 *
 * @param bits - Remaining tag bits; modified in place.
 * @param parser - Parser used to compile the values.
 * @param supportLegacy - Accept the `as` form.
 */
export const tokenKwargs = (bits: string[], parser: Parser, supportLegacy = false): Map<string, FilterExpression> => {
  const kwargs = new Map<string, FilterExpression>();
  if (bits.length === 0) return kwargs;

  const kwargFormat = reKwarg.exec(bits[0])?.[1] !== undefined;
  if (!kwargFormat && (!supportLegacy || bits.length < 3 || bits[1] !== 'as')) {
    return kwargs;
  }

  while (bits.length > 0) {
    let key: string;
    let value: string;
    if (kwargFormat) {
      const m = reKwarg.exec(bits[0]);
      if (!m || m[1] === undefined) return kwargs;
      key = m[1];
      value = m[2];
      bits.splice(0, 1);
    } else {
      if (bits.length < 3 || bits[1] !== 'as') return kwargs;
      key = bits[2];
      value = bits[0];
      bits.splice(0, 3);
    }
    kwargs.set(key, parser.compileFilter(value));
    if (bits.length > 0 && !kwargFormat) {
      if (bits[0] !== 'and') return kwargs;
      bits.splice(0, 1);
    }
  }
  return kwargs;
};
