import { Token } from './template-lexer.js';

/**
 * Source context attached to an error in debug mode.
 *
 * `sourceLines` holds `[lineNumber, escapedLine]` pairs around the failing
 * line; `before`, `during` and `after` split that line around the token.
 */
export interface TemplateDebugInfo {
  message: string;
  sourceLines: [number, string][];
  before: string;
  during: string;
  after: string;
  top: number;
  bottom: number;
  total: number;
  line: number;
  name: string;
  start: number;
  end: number;
}

/**
 * Any error object that may carry template diagnostics.
 */
export type AnnotatedError = Error & {
  token?: Token;
  templateDebug?: TemplateDebugInfo;
};

/**
 * Base class for errors raised by the engine itself.
 */
export class TemplateError extends Error {
  token?: Token;
  templateDebug?: TemplateDebugInfo;

  constructor (message: string) {
    super(message);
    this.name = 'TemplateError';
  }
}

/**
 * Compile-time failure: malformed expression, unknown or unclosed tag.
 */
export class TemplateSyntaxError extends TemplateError {
  constructor (message: string) {
    super(message);
    this.name = 'TemplateSyntaxError';
  }
}

/**
 * Render-time lookup miss.
 */
export class VariableDoesNotExist extends TemplateError {
  /** Path segment that could not be resolved. */
  readonly segment?: string;
  /** Value the segment was looked up on. */
  readonly current?: unknown;

  constructor (message: string, segment?: string, current?: unknown) {
    super(message);
    this.name = 'VariableDoesNotExist';
    this.segment = segment;
    this.current = current;
  }
}

/**
 * `pop()` was called on a context holding only its builtins frame.
 */
export class ContextPopException extends TemplateError {
  constructor (message = 'pop() has been called more times than push()') {
    super(message);
    this.name = 'ContextPopException';
  }
}

export class TemplateDoesNotExist extends TemplateError {
  /** Loader/location pairs that were tried, in order. */
  readonly tried: string[];

  constructor (templateName: string, tried: string[] = []) {
    super(templateName);
    this.name = 'TemplateDoesNotExist';
    this.tried = tried;
  }
}

/**
 * Invalid engine options.
 */
export class ImproperlyConfigured extends TemplateError {
  constructor (message: string) {
    super(message);
    this.name = 'ImproperlyConfigured';
  }
}

/**
 * Get the token an error was annotated with, if any.
 *
 * @param err - Error to inspect.
 * @returns The originating token or undefined.
 */
export const errorToken = (err: Error): Token | undefined => {
  if ('token' in err && err.token instanceof Token) return err.token;
  return undefined;
};

/**
 * Attach the originating token unless the error already carries one, so the
 * innermost failure wins when the parser recurses.
 *
 * @param err - Error to annotate.
 * @param token - Token being compiled when the error was raised.
 * @returns The same error object.
 */
export const annotateToken = (err: Error, token: Token): AnnotatedError => {
  if (errorToken(err) !== undefined) return err;
  return Object.assign(err, { token });
};

export const hasTemplateDebug = (err: Error): boolean => {
  return 'templateDebug' in err && err.templateDebug !== undefined;
};

export const annotateTemplateDebug = (err: Error, info: TemplateDebugInfo): AnnotatedError => {
  return Object.assign(err, { templateDebug: info });
};
