import type { Context } from './template-context.js';
import type { Parser } from './template-parser.js';

import type {
  RegisteredFilter,
} from './types.js';

import {
  TemplateSyntaxError,
} from './errors.js';

import {
  isSafe,
  markSafe,
} from './html-utils.js';

import {
  templateLocaltime,
} from './localize.js';

import {
  Variable,
  lookupFailure,
  stringIfInvalid,
} from './template-variable.js';

export const FILTER_SEPARATOR = '|';
export const FILTER_ARGUMENT_SEPARATOR = ':';

const strdq = String.raw`"[^"\\]*(?:\\.[^"\\]*)*"`;
const strsq = String.raw`'[^'\\]*(?:\\.[^'\\]*)*'`;
const constant = String.raw`(?:_\(${strdq}\)|_\(${strsq}\)|${strdq}|${strsq})`;
const num = String.raw`[-+.]?\d[\d.e]*`;
const varChars = String.raw`[\w.]+`;
const filterSep = String.raw`\|`;

/**
 * One piece of a filter expression: the leading constant or variable, or a
 * `|name[:arg]` filter call. Pieces must follow each other without gaps.
 */
const filterSource = [
  String.raw`^(?<constant>${constant})`,
  String.raw`^(?<var>${varChars}|${num})`,
  String.raw`(?:\s*${filterSep}\s*(?<filterName>\w+)(?:${FILTER_ARGUMENT_SEPARATOR}(?:(?<constantArg>${constant})|(?<varArg>${varChars}|${num})))?)`,
].join('|');

const filterRe = (): RegExp => new RegExp(filterSource, 'g');

export interface FilterArgument {
  /** False for quoted literals, whose value is marked safe. */
  lookup: boolean;
  variable: Variable;
}

export interface FilterCall {
  filter: RegisteredFilter;
  args: FilterArgument[];
}

/**
 * Fail at compile time when a filter is given the wrong number of arguments.
 * Counts include the filter's input value.
 */
const checkArity = (filter: RegisteredFilter, provided: number): void => {
  if (provided < filter.minArgs || provided > filter.maxArgs) {
    throw new TemplateSyntaxError(`${filter.name} requires ${filter.minArgs + 1} arguments, ${provided + 1} provided`);
  }
};

/**
 * A variable (or constant) followed by a chain of filters, as written inside
 * `{{ }}` or as a tag argument.
 *
 * @example
 * const fe = parser.compileFilter('name|default:"anonymous"|upper');
 * fe.resolve(context);
 */
export class FilterExpression {
  readonly token: string;
  readonly var: Variable;
  readonly filters: readonly FilterCall[];

  constructor (token: string, parser: Parser) {
    this.token = token;
    let variable: Variable | null = null;
    const filters: FilterCall[] = [];
    let upto = 0;

    for (const match of token.matchAll(filterRe())) {
      const start = match.index ?? 0;
      if (upto !== start) {
        throw new TemplateSyntaxError(`Could not parse some characters: ${token.slice(0, upto)}|${token.slice(upto, start)}|${token.slice(start)}`);
      }
      const groups = match.groups ?? {};
      if (variable === null) {
        const raw = groups.constant ?? groups.var;
        if (raw === undefined) {
          throw new TemplateSyntaxError(`Could not find variable at start of ${token}.`);
        }
        variable = new Variable(raw);
      } else {
        const filter = parser.findFilter(groups.filterName ?? '');
        const args: FilterArgument[] = [];
        if (groups.constantArg !== undefined) {
          args.push({ lookup: false, variable: new Variable(groups.constantArg) });
        } else if (groups.varArg !== undefined) {
          args.push({ lookup: true, variable: new Variable(groups.varArg) });
        }
        checkArity(filter, args.length);
        filters.push({ filter, args });
      }
      upto = start + match[0].length;
    }

    if (upto !== token.length) {
      throw new TemplateSyntaxError(`Could not parse the remainder: '${token.slice(upto)}' from '${token}'`);
    }
    if (variable === null) {
      throw new TemplateSyntaxError(`Could not find variable at start of ${token}.`);
    }
    this.var = variable;
    this.filters = filters;
  }

  /**
   * Evaluate the expression.
   *
   * A lookup miss on the leading variable or on a filter argument gives
   * `null` when `ignoreFailures` is set. Otherwise the engine's `stringIfInvalid` decides: `null`
   * rethrows, a string containing `%s` is returned with the variable text
   * substituted, any other non-empty string is returned as it is. In those
   * cases no filter runs. An empty string is fed through the filters.
   *
   * @param context - Context to resolve against.
   * @param ignoreFailures - Return null on a lookup miss.
   * @throws VariableDoesNotExist when the lookup fails and nothing replaces it.
   */
  resolve (context: Context, ignoreFailures = false): unknown {
    let obj: unknown;
    const base = this.var.evaluate(context);
    if (base.found) {
      obj = base.value;
    } else if (ignoreFailures) {
      obj = null;
    } else {
      const fallback = this.fallbackFor(context, this.var, base.segment, base.current);
      if (fallback !== '') return fallback;
      obj = fallback;
    }

    for (const { filter, args } of this.filters) {
      const argValues: unknown[] = args.map((arg) => this.resolveArgument(context, arg, ignoreFailures));
      if (filter.expectsLocaltime) {
        obj = templateLocaltime(obj, context.useTz, context.timeZone);
      }
      if (filter.needsAutoescape) {
        while (argValues.length < filter.maxArgs) argValues.push(undefined);
        argValues.push({ autoescape: context.autoescape });
      }
      const output = filter.fn(obj, ...argValues);
      obj = (filter.isSafe && isSafe(obj)) ? markSafe(output) : output;
    }
    return obj;
  }

  toString (): string {
    return this.token;
  }

  private resolveArgument (context: Context, arg: FilterArgument, ignoreFailures: boolean): unknown {
    const result = arg.variable.evaluate(context);
    if (!result.found) {
      if (ignoreFailures) return null;
      return this.fallbackFor(context, arg.variable, result.segment, result.current);
    }
    return arg.lookup ? result.value : markSafe(result.value);
  }

  private fallbackFor (context: Context, variable: Variable, segment: string, current: unknown): string {
    const invalid = stringIfInvalid(context);
    if (invalid === null) {
      throw lookupFailure(segment, current);
    }
    return invalid.includes('%s') ? invalid.replace('%s', variable.var) : invalid;
  }
}
