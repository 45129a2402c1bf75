/*!
 * loomtpl
 *
 * Compile-once, render-many text template engine with template
 * inheritance, pluggable tags and filters, and HTML autoescaping.
 *
 * Copyright (c) 2025-2026 cryeffect Media Group <https://crymg.de>, Peter Müller
 * Licensed under the MIT License.
 */

import type {
  TemplateData,
} from './types.js';

import type {
  EngineOptions,
} from './config.js';

import {
  Engine,
} from './engine.js';

import {
  Template,
} from './template.js';

export type {
  FilterCallOptions,
  FilterFlags,
  FilterOptions,
  RegisteredFilter,
  TagCompiler,
  TemplateData,
  TemplateFilterFunction,
} from './types.js';

export {
  Engine,
} from './engine.js';

export {
  engineOptionsSchema,
  parseEngineOptions,
} from './config.js';

export type {
  EngineConfig,
  EngineOptions,
} from './config.js';

export {
  ContextPopException,
  ImproperlyConfigured,
  TemplateDoesNotExist,
  TemplateError,
  TemplateSyntaxError,
  VariableDoesNotExist,
} from './errors.js';

export type {
  TemplateDebugInfo,
} from './errors.js';

export {
  SafeString,
  conditionalEscape,
  escapeHtml,
  isSafe,
  markSafe,
  unescapeHtml,
} from './html-utils.js';

export {
  Library,
  readFilterCallOptions,
} from './library.js';

export {
  FileSystemLoader,
  LocmemLoader,
} from './loaders.js';

export type {
  TemplateLoader,
  TemplateSource,
} from './loaders.js';

export {
  BaseContext,
  Context,
  ContextScope,
  RenderContext,
  RequestContext,
  makeContext,
} from './template-context.js';

export type {
  ContextFrame,
  ContextOptions,
  ContextProcessor,
} from './template-context.js';

export {
  FilterExpression,
} from './template-filters.js';

export {
  DebugLexer,
  Lexer,
  Token,
  tokenize,
} from './template-lexer.js';

export {
  Node,
  NodeList,
  TextNode,
  VariableNode,
  renderValueInContext,
} from './template-nodes.js';

export {
  Parser,
  tokenKwargs,
} from './template-parser.js';

export {
  Variable,
} from './template-variable.js';

export {
  Origin,
  Template,
} from './template.js';

/**
 * Render a template in one call.
 *
 * A source string is compiled with a new engine built from `options`; a
 * compiled Template renders with its own engine, and `options` are ignored.
 *
 * @param tpl - Template source or compiled template.
 * @param data - Template variables.
 * @param options - Engine options for source strings.
 * @returns Rendered text.
 * @throws TemplateSyntaxError when the source does not compile.
 */
export function renderTemplate (tpl: string | Template, data: TemplateData = {}, options: EngineOptions = {}): string {
  const template = (tpl instanceof Template) ? tpl : new Engine(options).fromString(tpl);
  return template.render(template.engine.makeContext(data));
}
