import type {
  FilterCallOptions,
  FilterOptions,
  RegisteredFilter,
  TagCompiler,
  TemplateFilterFunction,
} from './types.js';

const reName = /^[A-Za-z_]\w*$/;

/**
 * Read the options object a `needsAutoescape` filter receives as its last
 * argument. Autoescape is assumed on when it is missing.
 *
 * @param options - Last argument of the filter call.
 */
export const readFilterCallOptions = (options: unknown): FilterCallOptions => {
  if (typeof options === 'object' && options !== null && 'autoescape' in options) {
    return { autoescape: options.autoescape !== false };
  }
  return { autoescape: true };
};

/**
 * Resolve a filter's flags and arity.
 *
 * Flags given in `options` win over flags set as properties on the function.
 * The declared argument count is `fn.length` minus the input value (and minus
 * the trailing options argument of `needsAutoescape` filters).
 *
 * @param name - Filter name.
 * @param fn - Filter implementation.
 * @param options - Registration options.
 */
export const createFilter = (name: string, fn: TemplateFilterFunction, options: FilterOptions = {}): RegisteredFilter => {
  const needsAutoescape = options.needsAutoescape ?? fn.needsAutoescape ?? false;
  const declared = Math.max(0, fn.length - 1 - (needsAutoescape ? 1 : 0));
  const maxArgs = options.maxArgs ?? declared;
  const optionalArgs = options.optionalArgs ?? fn.optionalArgs ?? 0;
  return {
    name,
    fn,
    isSafe: options.isSafe ?? fn.isSafe ?? false,
    needsAutoescape,
    expectsLocaltime: options.expectsLocaltime ?? fn.expectsLocaltime ?? false,
    minArgs: options.minArgs ?? Math.max(0, maxArgs - optionalArgs),
    maxArgs,
  };
};

/**
 * A named set of tags and filters a parser can load.
 *
 * @example
 * const lib = new Library()
 *   .filter('shout', (value: unknown) => String(value).toUpperCase() + '!')
 *   .tag('now', (parser, token) => new NowNode());
 */
export class Library {
  readonly tags = new Map<string, TagCompiler>();
  readonly filters = new Map<string, RegisteredFilter>();

  /**
   * Register (or override) a block tag.
   *
   * @param name - Tag name, the first word inside `{% %}`.
   * @param compiler - Builds the node(s) for one occurrence of the tag.
   */
  tag (name: string, compiler: TagCompiler): this {
    if (!reName.test(name)) {
      throw new TypeError(`Invalid tag name: ${name}`);
    }
    if (typeof compiler !== 'function') {
      throw new TypeError('Tag compiler must be a function');
    }
    this.tags.set(name, compiler);
    return this;
  }

  /**
   * Register (or override) a filter.
   *
   * @param name - Filter name as used after `|`.
   * @param fn - Receives the current value and the template arguments.
   * @param options - Flags and arity overrides.
   */
  filter (name: string, fn: TemplateFilterFunction, options: FilterOptions = {}): this {
    if (!reName.test(name)) {
      throw new TypeError(`Invalid filter name: ${name}`);
    }
    if (typeof fn !== 'function') {
      throw new TypeError('Filter handler must be a function');
    }
    this.filters.set(name, createFilter(name, fn, options));
    return this;
  }
}
