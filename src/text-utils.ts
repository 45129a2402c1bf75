/**
 * Text helpers used by the tokenizer, variable parser and tag compilers.
 */

const reSmartSplit = /((?:[^\s'"]*(?:(?:"(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*')[^\s'"]*)+)|\S+)/g;

/**
 * Split a string on whitespace, keeping quoted sections (with backslash
 * escapes) together.
 *
 * @example
 * smartSplit('include "a b.html" with x=1'); // ['include', '"a b.html"', 'with', 'x=1']
 *
 * @param text - Input text.
 * @returns The pieces, quotes included.
 */
export const smartSplit = (text: string): string[] => {
  const bits: string[] = [];
  for (const m of text.matchAll(reSmartSplit)) {
    bits.push(m[0]);
  }
  return bits;
};

/**
 * Turn a quoted string literal into its value.
 *
 * @param s - Literal text including its surrounding quotes.
 * @returns The unquoted value, or null if `s` is not a quoted literal.
 */
export const unescapeStringLiteral = (s: string): string | null => {
  const quote = s[0];
  if (s.length < 2 || (quote !== '"' && quote !== "'") || s[s.length - 1] !== quote) {
    return null;
  }
  return s.slice(1, -1).replaceAll(`\\${quote}`, quote).replaceAll('\\\\', '\\');
};

/**
 * Join items as a readable list: `'a', 'b' or 'c'`.
 *
 * @param items - Items to join.
 * @param lastWord - Word placed before the last item.
 */
export const getTextList = (items: string[], lastWord = 'or'): string => {
  if (items.length === 0) return '';
  if (items.length === 1) return items[0];
  return `${items.slice(0, -1).join(', ')} ${lastWord} ${items[items.length - 1]}`;
};
