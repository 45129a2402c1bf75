import type {
  TemplateData,
} from './types.js';

import {
  createBuiltinLibrary,
} from './builtins.js';

import {
  parseEngineOptions,
} from './config.js';

import type {
  EngineOptions,
} from './config.js';

import {
  TemplateDoesNotExist,
} from './errors.js';

import {
  Library,
} from './library.js';

import {
  FileSystemLoader,
  LocmemLoader,
} from './loaders.js';

import type {
  TemplateLoader,
} from './loaders.js';

import {
  createModuleLogger,
} from './logger.js';

import {
  makeContext,
} from './template-context.js';

import type {
  Context,
  ContextProcessor,
} from './template-context.js';

import {
  Origin,
  Template,
} from './template.js';

const log = createModuleLogger('engine');

/**
 * Holds configuration shared by the templates it compiles: libraries,
 * loaders, escaping and localization defaults.
 *
 * @example
 * const engine = new Engine({ templates: { 'hello.html': 'Hello {{ name }}!' } });
 * engine.renderToString('hello.html', { name: 'World' }); // 'Hello World!'
 */
export class Engine {
  readonly debug: boolean;
  readonly autoescape: boolean;
  readonly stringIfInvalid: string | null;
  readonly useTz: boolean;
  readonly useL10n: boolean;
  readonly timeZone: string;
  readonly locale: string;
  readonly translate: (message: string) => string;
  readonly contextProcessors: readonly ContextProcessor[];
  /** Loaded into every parser, later ones overriding earlier ones. */
  readonly templateLibraries: readonly Library[];
  readonly loaders: readonly TemplateLoader[];
  private readonly cache = new Map<string, Template>();

  /**
   * @throws ImproperlyConfigured for invalid options.
   */
  constructor (options: EngineOptions = {}) {
    const config = parseEngineOptions(options);
    this.debug = config.debug;
    this.autoescape = config.autoescape;
    this.stringIfInvalid = config.stringIfInvalid;
    this.useTz = config.useTz;
    this.useL10n = config.useL10n;
    this.timeZone = config.timeZone;
    this.locale = config.locale;
    this.translate = config.translate ?? ((message) => message);
    this.contextProcessors = config.contextProcessors;

    const inline = new Library();
    for (const [ name, compiler ] of Object.entries(config.tags)) inline.tag(name, compiler);
    for (const [ name, fn ] of Object.entries(config.filters)) inline.filter(name, fn);
    this.templateLibraries = [
      ...(config.builtins ? [ createBuiltinLibrary() ] : []),
      ...config.libraries,
      inline,
    ];

    const loaders: TemplateLoader[] = [];
    if (Object.keys(config.templates).length > 0) loaders.push(new LocmemLoader(config.templates));
    if (config.dirs.length > 0) loaders.push(new FileSystemLoader(config.dirs));
    loaders.push(...config.loaders);
    this.loaders = loaders;
  }

  /**
   * Compile a template from source. Not cached.
   */
  fromString (source: string, name: string | null = null): Template {
    return new Template(source, this, { name });
  }

  /**
   * Load and compile a template by name, asking each loader in turn.
   * Compiled templates are cached per engine.
   *
   * @throws TemplateDoesNotExist when no loader has it.
   */
  getTemplate (templateName: string): Template {
    const cached = this.cache.get(templateName);
    if (cached) return cached;

    const tried: string[] = [];
    for (const loader of this.loaders) {
      const found = loader.getContents(templateName);
      if (found === null) {
        tried.push(loader.describe(templateName));
        continue;
      }
      const template = new Template(found.source, this, {
        name: templateName,
        origin: new Origin(found.name, templateName, loader),
      });
      this.cache.set(templateName, template);
      return template;
    }

    log.debug({ templateName, tried }, 'template not found');
    throw new TemplateDoesNotExist(templateName, tried);
  }

  /**
   * Load the first of `names` that exists.
   *
   * @throws TemplateDoesNotExist listing every location tried.
   */
  selectTemplate (names: readonly string[]): Template {
    if (names.length === 0) {
      throw new TemplateDoesNotExist('No template names provided');
    }
    const tried: string[] = [];
    for (const name of names) {
      try {
        return this.getTemplate(name);
      } catch (err) {
        if (!(err instanceof TemplateDoesNotExist)) throw err;
        tried.push(...err.tried);
      }
    }
    throw new TemplateDoesNotExist(names.join(', '), tried);
  }

  /**
   * A context with this engine's escaping and localization settings.
   *
   * @param data - Template variables.
   * @param request - Handed to the context processors when given.
   */
  makeContext (data: TemplateData = {}, request?: unknown): Context {
    return makeContext(data, request, {
      autoescape: this.autoescape,
      useL10n: this.useL10n,
      useTz: this.useTz,
      timeZone: this.timeZone,
      locale: this.locale,
    });
  }

  renderToString (templateName: string, data: TemplateData = {}, request?: unknown): string {
    return this.getTemplate(templateName).render(this.makeContext(data, request));
  }

  /** Drop compiled templates, e.g. after sources changed on disk. */
  reset (): void {
    this.cache.clear();
  }
}
