import type {
  TagCompiler,
} from '../types.js';

import {
  TemplateError,
  TemplateSyntaxError,
} from '../errors.js';

import {
  markSafe,
} from '../html-utils.js';

import type {
  SafeString,
} from '../html-utils.js';

import type {
  Context,
} from '../template-context.js';

import type {
  FilterExpression,
} from '../template-filters.js';

import {
  Node,
  NodeList,
  TextNode,
} from '../template-nodes.js';

import {
  tokenKwargs,
} from '../template-parser.js';

import {
  Template,
} from '../template.js';

export const BLOCK_CONTEXT_KEY = 'block_context';

/**
 * Block overrides collected while walking up an inheritance chain. For each
 * name the most derived block is last.
 */
export class BlockContext {
  readonly blocks = new Map<string, BlockNode[]>();

  /** Register blocks of a (more basic) template below the ones already known. */
  addBlocks (blocks: Map<string, BlockNode>): void {
    for (const [ name, block ] of blocks) {
      const stack = this.blocks.get(name) ?? [];
      stack.unshift(block);
      this.blocks.set(name, stack);
    }
  }

  pop (name: string): BlockNode | null {
    return this.blocks.get(name)?.pop() ?? null;
  }

  push (name: string, block: BlockNode): void {
    const stack = this.blocks.get(name) ?? [];
    stack.push(block);
    this.blocks.set(name, stack);
  }

  getBlock (name: string): BlockNode | null {
    const stack = this.blocks.get(name);
    return (stack && stack.length > 0) ? stack[stack.length - 1] : null;
  }
}

const blockContextOf = (context: Context): BlockContext | null => {
  const value = context.renderContext.get(BLOCK_CONTEXT_KEY);
  return (value instanceof BlockContext) ? value : null;
};

const blocksByName = (nodelist: NodeList): Map<string, BlockNode> => {
  const blocks = new Map<string, BlockNode>();
  for (const node of nodelist.getNodesByType('block')) {
    if (node instanceof BlockNode) blocks.set(node.name, node);
  }
  return blocks;
};

export class BlockNode extends Node {
  readonly kind = 'block';
  readonly name: string;
  readonly nodelist: NodeList;
  /** Context of the render that placed this block; `super()` renders against it. */
  context: Context | null = null;

  constructor (name: string, nodelist: NodeList) {
    super();
    this.name = name;
    this.nodelist = nodelist;
  }

  override childNodelists (): NodeList[] {
    return [ this.nodelist ];
  }

  override toString (): string {
    return `<Block Node: ${this.name}. Contents: ${this.nodelist.length} nodes>`;
  }

  render (context: Context): SafeString {
    const blockContext = blockContextOf(context);
    return context.push().run(() => {
      if (blockContext === null) {
        context.set('block', this);
        return this.nodelist.render(context);
      }
      const overriding = blockContext.pop(this.name);
      const source = overriding ?? this;
      // a fresh node per render keeps `context` out of the shared tree
      const block = new BlockNode(source.name, source.nodelist);
      block.context = context;
      context.set('block', block);
      const result = block.nodelist.render(context);
      if (overriding !== null) blockContext.push(this.name, overriding);
      return result;
    });
  }

  /**
   * Content of the same block one level up the inheritance chain
   * (`{{ block.super }}`).
   */
  super (): SafeString | string {
    if (this.context === null) {
      throw new TemplateSyntaxError(`'BlockNode' object has no attribute 'context'. Did you use {{ block.super }} in a base template?`);
    }
    const blockContext = blockContextOf(this.context);
    if (blockContext !== null && blockContext.getBlock(this.name) !== null) {
      return markSafe(this.render(this.context).toString());
    }
    return '';
  }
}

/**
 * Names tried in turn; the first that loads wins.
 */
const selectTemplate = (names: string[], context: Context): Template => {
  const engine = context.template?.engine;
  if (!engine) {
    throw new TemplateError('Loading a template requires a context bound to a template');
  }
  return engine.selectTemplate(names);
};

const toTemplateNames = (value: unknown): string[] => {
  if (Array.isArray(value)) return value.map((v) => String(v));
  return [ String(value) ];
};

export class ExtendsNode extends Node {
  readonly kind = 'extends';
  override readonly mustBeFirst = true;
  readonly nodelist: NodeList;
  readonly parentName: FilterExpression;
  readonly blocks: Map<string, BlockNode>;

  constructor (nodelist: NodeList, parentName: FilterExpression) {
    super();
    this.nodelist = nodelist;
    this.parentName = parentName;
    this.blocks = blocksByName(nodelist);
  }

  override childNodelists (): NodeList[] {
    return [ this.nodelist ];
  }

  override toString (): string {
    return `<ExtendsNode: extends ${this.parentName.token}>`;
  }

  /**
   * The parent template: a compiled Template from the context, or one
   * loaded by name.
   *
   * @throws TemplateSyntaxError when the name resolves to nothing.
   */
  getParent (context: Context): Template {
    const parent = this.parentName.resolve(context);
    if (parent instanceof Template) return parent;
    if (parent === null || parent === undefined || parent === '' || (Array.isArray(parent) && parent.length === 0)) {
      let error = `Invalid template name in 'extends' tag: ${String(parent)}.`;
      if (this.parentName.filters.length > 0 || this.parentName.var.lookups !== null) {
        error += ` Got this from the '${this.parentName.token}' variable.`;
      }
      throw new TemplateSyntaxError(error);
    }
    return selectTemplate(toTemplateNames(parent), context);
  }

  render (context: Context): string {
    const compiledParent = this.getParent(context);
    let blockContext = blockContextOf(context);
    if (blockContext === null) {
      blockContext = new BlockContext();
      context.renderContext.set(BLOCK_CONTEXT_KEY, blockContext);
    }
    blockContext.addBlocks(this.blocks);

    // a root template contributes its own blocks; an intermediate one
    // registers them when its extends node renders
    for (const node of compiledParent.nodelist) {
      if (node instanceof TextNode || typeof node === 'string') continue;
      if (!(node instanceof ExtendsNode)) {
        blockContext.addBlocks(blocksByName(compiledParent.nodelist));
      }
      break;
    }

    return context.renderContext.pushState(compiledParent, () => compiledParent.renderNodelist(context), false);
  }
}

export class IncludeNode extends Node {
  readonly kind = 'include';
  readonly template: FilterExpression;
  readonly extraContext: ReadonlyMap<string, FilterExpression>;
  readonly isolatedContext: boolean;

  constructor (template: FilterExpression, extraContext: Map<string, FilterExpression> = new Map(), isolatedContext = false) {
    super();
    this.template = template;
    this.extraContext = extraContext;
    this.isolatedContext = isolatedContext;
  }

  override toString (): string {
    return `<IncludeNode: template=${this.template.token}>`;
  }

  render (context: Context): string {
    const resolved = this.template.resolve(context);
    const template = (resolved instanceof Template) ? resolved : selectTemplate(toTemplateNames(resolved), context);

    const values: Record<string, unknown> = {};
    for (const [ name, value ] of this.extraContext) {
      values[name] = value.resolve(context);
    }
    if (this.isolatedContext) {
      return template.render(context.newContext(values));
    }
    return context.push(values).run(() => template.render(context));
  }
}

/**
 * `{% block name %}...{% endblock [name] %}`
 */
export const blockTag: TagCompiler = (parser, token) => {
  const bits = token.contents.split(/\s+/);
  if (bits.length !== 2) {
    throw new TemplateSyntaxError(`'${bits[0]}' tag takes only one argument`);
  }
  const blockName = bits[1];
  if (parser.loadedBlocks.has(blockName)) {
    throw new TemplateSyntaxError(`'${bits[0]}' tag with name '${blockName}' appears more than once`);
  }
  parser.loadedBlocks.add(blockName);

  const nodelist = parser.parse([ 'endblock' ]);
  const endblock = parser.nextToken();
  const acceptable = [ 'endblock', `endblock ${blockName}` ];
  if (!acceptable.includes(endblock.contents)) {
    throw parser.invalidBlockTag(endblock, 'endblock', acceptable);
  }
  return new BlockNode(blockName, nodelist);
};

/**
 * `{% extends "base.html" %}`; must come before any other tag.
 */
export const extendsTag: TagCompiler = (parser, token) => {
  const bits = token.splitContents();
  if (bits.length !== 2) {
    throw new TemplateSyntaxError(`'${bits[0]}' takes one argument`);
  }
  const parentName = parser.compileFilter(bits[1]);
  const nodelist = parser.parse();
  if (nodelist.getNodesByType('extends').length > 0) {
    throw new TemplateSyntaxError(`'${bits[0]}' cannot appear more than once in the same template`);
  }
  return new ExtendsNode(nodelist, parentName);
};

/**
 * `{% include "name" [with a=b ...] [only] %}`
 */
export const includeTag: TagCompiler = (parser, token) => {
  const bits = token.splitContents();
  if (bits.length < 2) {
    throw new TemplateSyntaxError(`'${bits[0]}' tag takes at least one argument: the name of the template to be included.`);
  }

  const remaining = bits.slice(2);
  const seen = new Set<string>();
  let extraContext = new Map<string, FilterExpression>();
  let isolated = false;
  while (remaining.length > 0) {
    const option = remaining.shift() ?? '';
    if (seen.has(option)) {
      throw new TemplateSyntaxError(`The '${option}' option was specified more than once.`);
    }
    seen.add(option);
    if (option === 'with') {
      extraContext = tokenKwargs(remaining, parser, false);
      if (extraContext.size === 0) {
        throw new TemplateSyntaxError(`"with" in '${bits[0]}' tag needs at least one keyword argument.`);
      }
    } else if (option === 'only') {
      isolated = true;
    } else {
      throw new TemplateSyntaxError(`Unknown argument for '${bits[0]}' tag: '${option}'.`);
    }
  }
  return new IncludeNode(parser.compileFilter(bits[1]), extraContext, isolated);
};
