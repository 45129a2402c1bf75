import type { Node } from './template-nodes.js';
import type { Parser } from './template-parser.js';
import type { Token } from './template-lexer.js';

/**
 * Variables handed to a render call.
 */
export type TemplateData = Record<string, unknown>;

/**
 * Options a `needsAutoescape` filter receives after its arguments.
 */
export interface FilterCallOptions {
  autoescape: boolean;
}

/**
 * Filter flags. They can be passed at registration or set as properties on
 * the filter function itself.
 */
export interface FilterFlags {
  /** Output stays marked safe when the input was safe. */
  isSafe?: boolean;
  /** Receives `{ autoescape }` after its (padded) arguments. */
  needsAutoescape?: boolean;
  /** Dates are converted to the context's time zone before the call. */
  expectsLocaltime?: boolean;
  /** How many of the declared arguments may be left out. */
  optionalArgs?: number;
}

/**
 * A filter: receives the current value plus the arguments given in the
 * template (`{{ value|name:arg }}`) and returns the new value.
 *
 * Optional arguments should be declared with `?` rather than a default, so
 * that they count towards the function's declared length.
 */
export interface TemplateFilterFunction extends FilterFlags {
  (value: unknown, ...args: unknown[]): unknown;
}

export interface FilterOptions extends FilterFlags {
  /** Fewest arguments accepted after the input value. */
  minArgs?: number;
  /** Most arguments accepted after the input value. */
  maxArgs?: number;
}

/**
 * A filter as stored in a library, with its flags and arity resolved.
 */
export interface RegisteredFilter {
  name: string;
  fn: TemplateFilterFunction;
  isSafe: boolean;
  needsAutoescape: boolean;
  expectsLocaltime: boolean;
  minArgs: number;
  maxArgs: number;
}

/**
 * Compiles a block tag. May consume further tokens from the parser (up to
 * its end tag) before returning the node(s) to insert.
 */
export type TagCompiler = (parser: Parser, token: Token) => Node | Node[];
