import { inspect } from 'node:util';

import {
  TemplateSyntaxError,
  VariableDoesNotExist,
} from './errors.js';

import {
  isSafe,
  markSafe,
} from './html-utils.js';

import {
  createModuleLogger,
} from './logger.js';

import {
  BaseContext,
  Context,
} from './template-context.js';

import {
  unescapeStringLiteral,
} from './text-utils.js';

export const VARIABLE_ATTRIBUTE_SEPARATOR = '.';

const log = createModuleLogger('variable');

/**
 * Outcome of resolving a variable: either the value, or the segment that
 * could not be found and the value it was looked up on.
 */
export type LookupResult =
  | { found: true; value: unknown }
  | { found: false; segment: string; current: unknown };

const reInteger = /^[-+]?\d+$/;
const reFloat = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

/**
 * Parse a numeric literal the way templates spell them: text containing `.`
 * or `e` is a float (a trailing `.` is not allowed), anything else an integer.
 *
 * @param text - Candidate literal.
 * @returns The number, or null if `text` is not numeric.
 * @throws TemplateSyntaxError for integers a double cannot hold exactly.
 */
const parseNumber = (text: string): number | null => {
  if (text.includes('.') || text.toLowerCase().includes('e')) {
    if (!reFloat.test(text) || text.endsWith('.')) return null;
    return Number(text);
  }
  if (!reInteger.test(text)) return null;
  const num = Number(text);
  if (!Number.isSafeInteger(num)) {
    throw new TemplateSyntaxError(`Integer literal out of range: '${text}'`);
  }
  return num;
};

/**
 * The string that replaces a failed or unsafe lookup, as configured on the
 * engine of the template the context is bound to. `null` means "propagate".
 *
 * @param context - Context (or plain mapping) being resolved against.
 */
export const stringIfInvalid = (context: unknown): string | null => {
  if (context instanceof Context && context.template) return context.template.engine.stringIfInvalid;
  return '';
};

const invalidValue = (context: unknown): string => stringIfInvalid(context) ?? '';

const translatorFor = (context: unknown): (message: string) => string => {
  if (context instanceof Context && context.template) return context.template.engine.translate;
  return (message) => message;
};

const templateNameOf = (context: unknown): string => {
  return (context instanceof Context && context.templateName) ? context.templateName : 'unknown';
};

const found = (value: unknown): LookupResult => ({ found: true, value });

/**
 * Object that defines `key` somewhere on the prototype chain of `target`.
 */
const ownerOf = (target: object, key: string): object | null => {
  let obj: object | null = target;
  while (obj !== null) {
    if (Object.prototype.hasOwnProperty.call(obj, key)) return obj;
    obj = Object.getPrototypeOf(obj);
  }
  return null;
};

/**
 * Members that come from the language rather than the data: `constructor`
 * and anything inherited from `Object.prototype` or `Function.prototype`.
 */
const isLanguageMember = (target: object, key: string): boolean => {
  if (key === 'constructor') return true;
  const owner = ownerOf(target, key);
  return owner === Object.prototype || owner === Function.prototype;
};

/** Prototypes of built-ins whose methods change the receiver. */
const mutableBuiltinPrototypes: object[] = [
  Array.prototype,
  Map.prototype,
  Set.prototype,
  WeakMap.prototype,
  WeakSet.prototype,
  Date.prototype,
  RegExp.prototype,
  Promise.prototype,
  ArrayBuffer.prototype,
  DataView.prototype,
  Object.getPrototypeOf(Uint8Array.prototype),
];

const builtinMethods: ReadonlySet<unknown> = new Set(mutableBuiltinPrototypes.flatMap((proto) => {
  return Object.getOwnPropertyNames(proto).map((key) => Object.getOwnPropertyDescriptor(proto, key)?.value);
}).filter((value) => typeof value === 'function'));

const reClassSource = /^class[\s{]/;

const isClass = (fn: Function): boolean => reClassSource.test(Function.prototype.toString.call(fn));

/**
 * Resolve one path segment against `current`. Tried in order:
 * 1. container key (Map, context, own data property of an object)
 * 2. attribute (any non-language member, boxed for primitives; never on contexts)
 * 3. integer index (arrays and strings)
 *
 * @param current - Value to look the segment up on.
 * @param segment - Path segment.
 */
const lookupSegment = (current: unknown, segment: string): LookupResult => {
  if (current instanceof BaseContext) {
    if (current.has(segment)) return found(current.get(segment));
  } else if (current instanceof Map) {
    if (current.has(segment)) return found(current.get(segment));
  } else if (current !== null && typeof current === 'object' && !Array.isArray(current)) {
    const desc = Object.getOwnPropertyDescriptor(current, segment);
    if (desc && 'value' in desc) return found(desc.value);
  }

  if (!(current instanceof BaseContext) && current !== null && current !== undefined) {
    const target: object = (typeof current === 'object' || typeof current === 'function') ? current : Object(current);
    if (segment in target && !isLanguageMember(target, segment)) {
      return found(Reflect.get(target, segment));
    }
  }

  if (/^\d+$/.test(segment)) {
    const index = Number(segment);
    if ((Array.isArray(current) || typeof current === 'string') && index < current.length) {
      return found(current[index]);
    }
  }

  return { found: false, segment, current };
};

/**
 * Apply the call policy to a function met during lookup:
 * - `doNotCallInTemplates` or a class: returned as it is
 * - `altersData`, or a method of Array, Map, Set, Date and the other
 *   mutable built-ins: never called, replaced by the invalid-variable string
 * - declares parameters: replaced by the invalid-variable string
 * - otherwise called with no arguments, `this` being the object it was read from
 */
const callInTemplate = (fn: Function, owner: unknown, context: unknown): unknown => {
  if (Reflect.get(fn, 'doNotCallInTemplates') === true || isClass(fn)) return fn;
  if (Reflect.get(fn, 'altersData') === true || builtinMethods.has(fn)) return invalidValue(context);
  if (fn.length > 0) return invalidValue(context);
  return Reflect.apply(fn, owner, []);
};

const isSilentFailure = (err: unknown): boolean => {
  return typeof err === 'object' && err !== null && 'silentVariableFailure' in err && err.silentVariableFailure === true;
};

const describe = (value: unknown): string => inspect(value, { depth: 1, breakLength: Infinity });

/**
 * The error for a path segment that could not be found on `current`.
 */
export const lookupFailure = (segment: string, current: unknown): VariableDoesNotExist => {
  return new VariableDoesNotExist(`Failed lookup for key [${segment}] in ${describe(current)}`, segment, current);
};

/**
 * A compiled variable reference: a literal, or a dotted lookup path.
 *
 * @example
 * new Variable('article.section').resolve({ article: { section: 'News' } }); // 'News'
 * new Variable('"quoted"').resolve({}); // SafeString('quoted')
 */
export class Variable {
  readonly var: string;
  readonly literal: unknown = null;
  readonly lookups: readonly string[] | null = null;
  /** Result is passed through the engine's translate function. */
  readonly translate: boolean = false;

  constructor (raw: string) {
    this.var = raw;

    const num = parseNumber(raw);
    if (num !== null) {
      this.literal = num;
      return;
    }

    let text = raw;
    if (text.startsWith('_(') && text.endsWith(')')) {
      this.translate = true;
      text = text.slice(2, -1);
    }

    const str = unescapeStringLiteral(text);
    if (str !== null) {
      this.literal = markSafe(str);
      return;
    }

    if (text.includes(VARIABLE_ATTRIBUTE_SEPARATOR + '_') || text.startsWith('_')) {
      throw new TemplateSyntaxError(`Variables and attributes may not begin with underscores: '${text}'`);
    }
    this.lookups = text.split(VARIABLE_ATTRIBUTE_SEPARATOR);
  }

  /**
   * Resolve against a context (or any plain mapping).
   *
   * @throws VariableDoesNotExist when a path segment cannot be found.
   */
  resolve (context: unknown): unknown {
    const result = this.evaluate(context);
    if (!result.found) {
      throw lookupFailure(result.segment, result.current);
    }
    return result.value;
  }

  /**
   * Resolve without throwing on a miss.
   */
  evaluate (context: unknown): LookupResult {
    const result = (this.lookups !== null) ? this.resolveLookup(context) : found(this.literal);
    if (!result.found || !this.translate) return result;

    const value = result.value;
    const translated = translatorFor(context)(String(value));
    return found(isSafe(value) ? markSafe(translated) : translated);
  }

  toString (): string {
    return this.var;
  }

  private resolveLookup (context: unknown): LookupResult {
    const lookups = this.lookups ?? [];
    let current: unknown = context;
    let segment = '';
    try {
      for (segment of lookups) {
        const owner = current;
        const step = lookupSegment(current, segment);
        if (!step.found) {
          log.debug({ segment, template: templateNameOf(context) }, 'failed lookup');
          return step;
        }
        current = step.value;
        if (typeof current === 'function') {
          current = callInTemplate(current, owner, context);
        }
      }
    } catch (err) {
      log.debug({ err, segment, template: templateNameOf(context) }, 'exception while resolving variable');
      if (isSilentFailure(err)) return found(invalidValue(context));
      throw err;
    }
    return found(current);
  }
}
