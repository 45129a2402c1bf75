import type { Template } from './template.js';

import {
  ContextPopException,
} from './errors.js';

/**
 * One scope of a context stack.
 */
export type ContextFrame = Record<string, unknown>;

/**
 * Builds the extra variables a request contributes to a context.
 */
export type ContextProcessor<TRequest = unknown> = (request: TRequest) => ContextFrame;

const hasOwn = (frame: ContextFrame, key: string): boolean => Object.prototype.hasOwnProperty.call(frame, key);

/**
 * Constants available in every context. This frame is never popped.
 */
export const contextBuiltins = (): ContextFrame => ({
  True: true,
  False: false,
  None: null,
  true: true,
  false: false,
  null: null,
});

/**
 * Handle for a pushed frame.
 */
export class ContextScope {
  readonly context: BaseContext;
  readonly frame: ContextFrame;

  constructor (context: BaseContext, frame: ContextFrame) {
    this.context = context;
    this.frame = frame;
  }

  pop (): ContextFrame {
    return this.context.pop();
  }

  /**
   * Run `fn` inside this scope; the frame is popped when `fn` returns or throws.
   */
  run<T> (fn: () => T): T {
    try {
      return fn();
    } finally {
      this.pop();
    }
  }
}

/**
 * A stack of frames that reads like a single mapping: lookups scan from the
 * most recently pushed frame down to the builtins.
 */
export class BaseContext implements Iterable<ContextFrame> {
  dicts: ContextFrame[] = [];

  constructor (data?: ContextFrame | null) {
    this.resetDicts(data);
  }

  protected resetDicts (data?: ContextFrame | null): void {
    this.dicts = [ contextBuiltins() ];
    if (data) this.dicts.push(data);
  }

  /**
   * Push a new frame holding the given mappings merged left to right. Other
   * contexts contribute all their frames except the builtins.
   *
   * @returns Handle whose `pop()` / `run()` releases the frame.
   */
  push (...mappings: (ContextFrame | BaseContext)[]): ContextScope {
    const frame: ContextFrame = {};
    for (const m of mappings) {
      if (m instanceof BaseContext) {
        for (const d of m.dicts.slice(1)) Object.assign(frame, d);
      } else {
        Object.assign(frame, m);
      }
    }
    this.dicts.push(frame);
    return new ContextScope(this, frame);
  }

  /**
   * Remove the top frame.
   *
   * @throws ContextPopException when only the builtins frame is left.
   */
  pop (): ContextFrame {
    if (this.dicts.length <= 1) {
      throw new ContextPopException();
    }
    const frame = this.dicts[this.dicts.length - 1];
    this.dicts.length -= 1;
    return frame;
  }

  /** Set a variable in the top frame. */
  set (key: string, value: unknown): void {
    this.dicts[this.dicts.length - 1][key] = value;
  }

  /**
   * Set a variable in the highest frame that already defines it, or in the
   * top frame if none does.
   */
  setUpward (key: string, value: unknown): void {
    let target = this.dicts[this.dicts.length - 1];
    for (let i = this.dicts.length - 1; i >= 0; i--) {
      if (hasOwn(this.dicts[i], key)) {
        target = this.dicts[i];
        break;
      }
    }
    target[key] = value;
  }

  get (key: string, otherwise?: unknown): unknown {
    for (let i = this.dicts.length - 1; i >= 0; i--) {
      const d = this.dicts[i];
      if (hasOwn(d, key)) return d[key];
    }
    return otherwise;
  }

  has (key: string): boolean {
    return this.dicts.some((d) => hasOwn(d, key));
  }

  /** Delete a variable from the top frame. */
  delete (key: string): void {
    delete this.dicts[this.dicts.length - 1][key];
  }

  setDefault (key: string, value: unknown): unknown {
    if (this.has(key)) return this.get(key);
    this.set(key, value);
    return value;
  }

  /**
   * Collapse all frames into one mapping; upper frames win.
   */
  flatten (): ContextFrame {
    const flat: ContextFrame = {};
    for (const d of this.dicts) Object.assign(flat, d);
    return flat;
  }

  equals (other: unknown): boolean {
    if (!(other instanceof BaseContext)) return false;
    const a = this.flatten();
    const b = other.flatten();
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((k) => hasOwn(b, k) && Object.is(a[k], b[k]));
  }

  copy (): BaseContext {
    const duplicate = new BaseContext();
    duplicate.dicts = [ ...this.dicts ];
    return duplicate;
  }

  /** Frames from the top of the stack down. */
  * [Symbol.iterator] (): Iterator<ContextFrame> {
    for (let i = this.dicts.length - 1; i >= 0; i--) yield this.dicts[i];
  }
}

export interface ContextOptions {
  autoescape?: boolean;
  useL10n?: boolean;
  useTz?: boolean;
  /** IANA zone that dates are converted to when `useTz` is on. */
  timeZone?: string;
  locale?: string;
}

/**
 * The variable stack a template renders against.
 */
export class Context extends BaseContext {
  autoescape: boolean;
  useL10n: boolean;
  useTz: boolean;
  timeZone: string;
  locale: string;
  templateName = 'unknown';
  renderContext = new RenderContext();
  /** Outermost template being rendered, set by `bindTemplate`. */
  template: Template | null = null;

  constructor (data?: ContextFrame | null, options: ContextOptions = {}) {
    super(data);
    this.autoescape = options.autoescape ?? true;
    this.useL10n = options.useL10n ?? false;
    this.useTz = options.useTz ?? false;
    this.timeZone = options.timeZone ?? 'UTC';
    this.locale = options.locale ?? 'en-US';
  }

  get options (): Required<ContextOptions> {
    return {
      autoescape: this.autoescape,
      useL10n: this.useL10n,
      useTz: this.useTz,
      timeZone: this.timeZone,
      locale: this.locale,
    };
  }

  /**
   * Bind the context to `template` while `fn` runs.
   *
   * @throws Error when the context is already bound.
   */
  bindTemplate<T> (template: Template, fn: () => T): T {
    if (this.template !== null) {
      throw new Error('Context is already bound to a template');
    }
    this.template = template;
    try {
      return fn();
    } finally {
      this.template = null;
    }
  }

  /**
   * Push a copy of `other` (or the top frame of another context).
   */
  update (other: ContextFrame | BaseContext): ContextScope {
    const frame = (other instanceof BaseContext) ? other.dicts[other.dicts.length - 1] : other;
    return this.push(frame);
  }

  override copy (): Context {
    const duplicate = new Context(null, this.options);
    duplicate.dicts = [ ...this.dicts ];
    duplicate.templateName = this.templateName;
    duplicate.renderContext = this.renderContext.copy();
    duplicate.template = this.template;
    return duplicate;
  }

  /**
   * A context with the same settings, bound template and render state, but
   * holding only `values`.
   */
  newContext (values?: ContextFrame | null): Context {
    const fresh = this.copy();
    fresh.resetDicts(values);
    return fresh;
  }
}

/**
 * Per-template scratch space for node state.
 *
 * Only the top frame is visible: each template entered through `pushState`
 * gets its own namespace.
 */
export class RenderContext extends BaseContext {
  /** Template currently rendering. */
  template: Template | null = null;

  override get (key: string, otherwise?: unknown): unknown {
    const top = this.dicts[this.dicts.length - 1];
    return hasOwn(top, key) ? top[key] : otherwise;
  }

  override has (key: string): boolean {
    return hasOwn(this.dicts[this.dicts.length - 1], key);
  }

  override * [Symbol.iterator] (): Iterator<ContextFrame> {
    yield this.dicts[this.dicts.length - 1];
  }

  override copy (): RenderContext {
    const duplicate = new RenderContext();
    duplicate.dicts = [ ...this.dicts ];
    duplicate.template = this.template;
    return duplicate;
  }

  /**
   * Make `template` current while `fn` runs, in a fresh frame unless
   * `isolatedContext` is false. The previous template is restored afterwards.
   */
  pushState<T> (template: Template, fn: () => T, isolatedContext = true): T {
    const initial = this.template;
    this.template = template;
    if (isolatedContext) this.push();
    try {
      return fn();
    } finally {
      this.template = initial;
      if (isolatedContext) this.pop();
    }
  }
}

/**
 * Context populated by context processors while bound to a template.
 */
export class RequestContext<TRequest = unknown> extends Context {
  readonly request: TRequest;
  private readonly processors: ContextProcessor<TRequest>[];
  private readonly processorsIndex: number;

  constructor (
    request: TRequest,
    data?: ContextFrame | null,
    processors: ContextProcessor<TRequest>[] = [],
    options: ContextOptions = {},
  ) {
    super(data, options);
    this.request = request;
    this.processors = [ ...processors ];
    this.processorsIndex = this.dicts.length;

    // placeholder for processor output
    this.update({});
    // frame for later writes, so processors never overwrite them
    this.update({});
  }

  override bindTemplate<T> (template: Template, fn: () => T): T {
    if (this.template !== null) {
      throw new Error('Context is already bound to a template');
    }
    this.template = template;
    const updates: ContextFrame = {};
    for (const processor of template.engine.contextProcessors) {
      Object.assign(updates, processor(this.request));
    }
    for (const processor of this.processors) {
      Object.assign(updates, processor(this.request));
    }
    this.dicts[this.processorsIndex] = updates;
    try {
      return fn();
    } finally {
      this.template = null;
      this.dicts[this.processorsIndex] = {};
    }
  }
}

/**
 * Build a context for a render call: a RequestContext when a request is
 * given, a plain Context otherwise.
 *
 * @param data - Template variables.
 * @param request - Optional request object handed to context processors.
 * @param options - Escaping and localization settings.
 */
export const makeContext = (data?: ContextFrame | null, request?: unknown, options: ContextOptions = {}): Context => {
  if (request === undefined) {
    return new Context(data, options);
  }
  const context = new RequestContext(request, null, [], options);
  if (data) context.push(data);
  return context;
};
