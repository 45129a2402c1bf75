/**
 * Engine options: schema, defaults and validation.
 */

import { z } from 'zod';

import type {
  TagCompiler,
  TemplateFilterFunction,
} from './types.js';

import {
  ImproperlyConfigured,
} from './errors.js';

import {
  Library,
} from './library.js';

import type {
  TemplateLoader,
} from './loaders.js';

import type {
  ContextProcessor,
} from './template-context.js';

const isFunction = (value: unknown): boolean => typeof value === 'function';

const isLoader = (value: unknown): boolean => {
  return typeof value === 'object' && value !== null && 'getContents' in value && typeof value.getContents === 'function';
};

const isTimeZone = (value: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
};

const isLocale = (value: string): boolean => {
  try {
    return Intl.getCanonicalLocales(value).length === 1;
  } catch {
    return false;
  }
};

export const engineOptionsSchema = z.object({
  /** Track token positions and attach source excerpts to errors. */
  debug: z.boolean().default(false),
  autoescape: z.boolean().default(true),
  /** Output for failed lookups; may contain one `%s`. `null` makes misses throw. */
  stringIfInvalid: z.string().nullable().default(''),
  tags: z.record(z.string(), z.custom<TagCompiler>(isFunction, 'tag compiler must be a function')).default({}),
  filters: z.record(z.string(), z.custom<TemplateFilterFunction>(isFunction, 'filter must be a function')).default({}),
  libraries: z.array(z.instanceof(Library)).default([]),
  /** Load the built-in tags and filters. */
  builtins: z.boolean().default(true),
  /** In-memory template sources by name. */
  templates: z.record(z.string(), z.string()).default({}),
  /** Directories searched for templates. */
  dirs: z.union([ z.string(), z.array(z.string()) ]).transform((dirs) => (typeof dirs === 'string' ? [ dirs ] : dirs)).default([]),
  loaders: z.array(z.custom<TemplateLoader>(isLoader, 'loader must implement getContents()')).default([]),
  contextProcessors: z.array(z.custom<ContextProcessor>(isFunction, 'context processor must be a function')).default([]),
  useTz: z.boolean().default(false),
  useL10n: z.boolean().default(false),
  timeZone: z.string().refine(isTimeZone, (tz) => ({ message: `Unknown time zone: ${tz}` })).default('UTC'),
  locale: z.string().refine(isLocale, (locale) => ({ message: `Invalid locale: ${locale}` })).default('en-US'),
  /** Applied to `_("...")` literals. */
  translate: z.custom<(message: string) => string>(isFunction, 'translate must be a function').optional(),
}).strict();

export type EngineOptions = z.input<typeof engineOptionsSchema>;
export type EngineConfig = z.output<typeof engineOptionsSchema>;

/**
 * Validate engine options and fill in defaults.
 *
 * @throws ImproperlyConfigured listing every invalid option.
 */
export const parseEngineOptions = (options: EngineOptions = {}): EngineConfig => {
  const result = engineOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${where}${issue.message}`;
    });
    throw new ImproperlyConfigured(`Invalid engine options: ${issues.join('; ')}`);
  }
  return result.data;
};
