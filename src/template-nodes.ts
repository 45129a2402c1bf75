import type { Origin } from './template.js';

import type { FilterExpression } from './template-filters.js';

import {
  annotateTemplateDebug,
  hasTemplateDebug,
} from './errors.js';

import {
  SafeString,
  conditionalEscape,
  markSafe,
} from './html-utils.js';

import {
  localize,
  templateLocaltime,
} from './localize.js';

import type {
  Context,
} from './template-context.js';

import type {
  Token,
} from './template-lexer.js';

/**
 * A compiled piece of a template.
 *
 * Subclasses set `kind` (used by `getNodesByType`) and list the node lists
 * they own in `childNodelists`.
 */
export abstract class Node {
  abstract readonly kind: string;
  /** Only legal as the first non-text node of a template. */
  readonly mustBeFirst: boolean = false;
  /** Set by the parser. */
  token: Token | null = null;
  origin: Origin | null = null;

  abstract render (context: Context): string | SafeString;

  childNodelists (): NodeList[] {
    return [];
  }

  /**
   * Render, attaching source diagnostics to a failure when the engine runs
   * in debug mode.
   */
  renderAnnotated (context: Context): string | SafeString {
    try {
      return this.render(context);
    } catch (err) {
      const template = context.renderContext.template;
      if (err instanceof Error && template?.engine.debug && !hasTemplateDebug(err)) {
        annotateTemplateDebug(err, template.getExceptionInfo(err, this.token));
      }
      throw err;
    }
  }

  /**
   * This node (if it matches) followed by matching nodes of its children,
   * in pre-order.
   */
  getNodesByType (kind: string): Node[] {
    const nodes: Node[] = (this.kind === kind) ? [ this ] : [];
    for (const nodelist of this.childNodelists()) {
      nodes.push(...nodelist.getNodesByType(kind));
    }
    return nodes;
  }

  toString (): string {
    return `<${this.constructor.name}>`;
  }
}

export type NodeListItem = Node | string;

/**
 * An ordered list of nodes. Rendering concatenates the children, each being
 * responsible for its own escaping, and marks the result safe.
 */
export class NodeList implements Iterable<NodeListItem> {
  readonly items: NodeListItem[] = [];
  /** Set once a non-text node has been added by the parser. */
  containsNontext = false;

  constructor (items: NodeListItem[] = []) {
    this.items.push(...items);
  }

  get length (): number {
    return this.items.length;
  }

  push (...items: NodeListItem[]): void {
    this.items.push(...items);
  }

  render (context: Context): SafeString {
    let out = '';
    for (const item of this.items) {
      out += (typeof item === 'string') ? item : String(item.renderAnnotated(context));
    }
    return markSafe(out);
  }

  getNodesByType (kind: string): Node[] {
    const nodes: Node[] = [];
    for (const item of this.items) {
      if (typeof item !== 'string') nodes.push(...item.getNodesByType(kind));
    }
    return nodes;
  }

  [Symbol.iterator] (): Iterator<NodeListItem> {
    return this.items[Symbol.iterator]();
  }
}

export class TextNode extends Node {
  readonly kind = 'text';
  readonly s: string;

  constructor (s: string) {
    super();
    this.s = s;
  }

  render (): string {
    return this.s;
  }

  override toString (): string {
    return `<TextNode: ${JSON.stringify(this.s.slice(0, 25))}>`;
  }
}

/**
 * Convert a resolved value to output text: dates are shifted to the
 * context's zone and formatted, numbers localized when enabled, then the
 * result is escaped under autoescape unless it is marked safe.
 *
 * @param value - Resolved value.
 * @param context - Current context.
 */
export const renderValueInContext = (value: unknown, context: Context): string => {
  const local = templateLocaltime(value, context.useTz, context.timeZone);
  const localized = localize(local, {
    useL10n: context.useL10n,
    locale: context.locale,
    timeZone: context.useTz ? context.timeZone : 'UTC',
  });
  if (localized === null || localized === undefined) return '';
  return context.autoescape ? conditionalEscape(localized) : String(localized);
};

export class VariableNode extends Node {
  readonly kind = 'variable';
  readonly filterExpression: FilterExpression;

  constructor (filterExpression: FilterExpression) {
    super();
    this.filterExpression = filterExpression;
  }

  render (context: Context): string {
    return renderValueInContext(this.filterExpression.resolve(context), context);
  }

  override toString (): string {
    return `<Variable Node: ${this.filterExpression.token}>`;
  }
}
