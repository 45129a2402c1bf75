import {
  smartSplit,
} from './text-utils.js';

export const BLOCK_TAG_START = '{%';
export const BLOCK_TAG_END = '%}';
export const VARIABLE_TAG_START = '{{';
export const VARIABLE_TAG_END = '}}';
export const COMMENT_TAG_START = '{#';
export const COMMENT_TAG_END = '#}';

/**
 * Matches one variable, block or comment tag including its delimiters.
 * Tags never span a line break.
 */
const reTag = /(\{%.*?%\}|\{\{.*?\}\}|\{#.*?#\})/g;

export type TokenType = 'text' | 'var' | 'block' | 'comment';

/**
 * Start and end offset of a token in the template source, in UTF-16 code
 * units, so `source.slice(start, end)` is the token's text.
 */
export type TokenPosition = [number, number];

/**
 * A classified piece of template source.
 */
export class Token {
  readonly type: TokenType;
  /** Token text; for tags the delimiters are stripped and the rest trimmed. */
  readonly contents: string;
  /** Only recorded by the debug lexer. */
  readonly position: TokenPosition | null;
  readonly lineno: number;

  constructor (type: TokenType, contents: string, position: TokenPosition | null = null, lineno = 1) {
    this.type = type;
    this.contents = contents;
    this.position = position;
    this.lineno = lineno;
  }

  toString (): string {
    const typeName = this.type[0].toUpperCase() + this.type.slice(1);
    return `<${typeName} token: "${this.contents.slice(0, 20).replace(/\n/g, '')}...">`;
  }

  /**
   * Split the contents on whitespace, keeping quoted strings and
   * translation markers such as `_("two words")` in one piece.
   */
  splitContents (): string[] {
    const split: string[] = [];
    const bits = smartSplit(this.contents);
    for (let i = 0; i < bits.length; i++) {
      let bit = bits[i];
      if (bit.startsWith('_("') || bit.startsWith("_('")) {
        const sentinel = `${bit[2]})`;
        const transBits = [ bit ];
        while (!bit.endsWith(sentinel) && i + 1 < bits.length) {
          i++;
          bit = bits[i];
          transBits.push(bit);
        }
        bit = transBits.join(' ');
      }
      split.push(bit);
    }
    return split;
  }
}

/**
 * Splits template source into tokens.
 */
export class Lexer {
  protected readonly source: string;
  /** Closing block content while inside `{% verbatim %}`, false otherwise. */
  protected verbatim: string | false = false;

  constructor (source: string) {
    this.source = source;
  }

  /**
   * Split the source into text, variable, block and comment tokens.
   *
   * @returns Tokens in source order.
   */
  tokenize (): Token[] {
    let inTag = false;
    let lineno = 1;
    const result: Token[] = [];
    for (const bit of this.source.split(reTag)) {
      if (bit) result.push(this.createToken(bit, null, lineno, inTag));
      inTag = !inTag;
      lineno += countNewlines(bit);
    }
    return result;
  }

  /**
   * Classify one piece of source.
   *
   * @param tokenString - Raw text, delimiters included for tags.
   * @param position - Source offsets, if tracked.
   * @param lineno - Line the piece starts on.
   * @param inTag - Whether the piece matched the tag pattern.
   */
  protected createToken (tokenString: string, position: TokenPosition | null, lineno: number, inTag: boolean): Token {
    let blockContent = '';
    if (inTag && tokenString.startsWith(BLOCK_TAG_START)) {
      blockContent = tokenString.slice(2, -2).trim();
      if (this.verbatim && blockContent === this.verbatim) {
        this.verbatim = false;
      }
    }
    if (inTag && !this.verbatim) {
      if (tokenString.startsWith(VARIABLE_TAG_START)) {
        return new Token('var', tokenString.slice(2, -2).trim(), position, lineno);
      }
      if (tokenString.startsWith(BLOCK_TAG_START)) {
        const head = blockContent.slice(0, 9);
        if (head === 'verbatim' || head === 'verbatim ') {
          this.verbatim = `end${blockContent}`;
        }
        return new Token('block', blockContent, position, lineno);
      }
      if (tokenString.startsWith(COMMENT_TAG_START)) {
        return new Token('comment', tokenString.slice(2, -2).trim(), position, lineno);
      }
    }
    return new Token('text', tokenString, position, lineno);
  }
}

/**
 * Lexer that also records each token's source offsets. Slower; used when the
 * engine runs in debug mode.
 */
export class DebugLexer extends Lexer {
  override tokenize (): Token[] {
    let lineno = 1;
    const result: Token[] = [];
    let upto = 0;
    for (const m of this.source.matchAll(reTag)) {
      const start = m.index ?? 0;
      const end = start + m[0].length;
      if (start > upto) {
        const text = this.source.slice(upto, start);
        result.push(this.createToken(text, [ upto, start ], lineno, false));
        lineno += countNewlines(text);
        upto = start;
      }
      const tag = this.source.slice(start, end);
      result.push(this.createToken(tag, [ start, end ], lineno, true));
      lineno += countNewlines(tag);
      upto = end;
    }
    const lastBit = this.source.slice(upto);
    if (lastBit) {
      result.push(this.createToken(lastBit, [ upto, upto + lastBit.length ], lineno, false));
    }
    return result;
  }
}

/**
 * Tokenize template source.
 *
 * @param source - Template text.
 * @param debug - Record source offsets on every token.
 * @returns Tokens in source order.
 */
export const tokenize = (source: string, debug = false): Token[] => {
  return debug ? new DebugLexer(source).tokenize() : new Lexer(source).tokenize();
};

const countNewlines = (s: string): number => {
  let n = 0;
  for (let i = s.indexOf('\n'); i !== -1; i = s.indexOf('\n', i + 1)) n++;
  return n;
};
