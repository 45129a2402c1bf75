/**
 * Escape a string to be safely inserted into HTML text or attribute contexts.
 *
 * Implementation detail: encodes `&`, `<`, `>`, `"` and `'` to ensure consistent,
 * attribute-safe output.
 *
 * @param str The string to escape.
 * @returns The escaped string.
 *
 * @example
 * ```ts
 * const unsafeString = '<script>alert("XSS")</script>';
 * const safeString = escapeHtml(unsafeString);
 * // safeString will be '&lt;script&gt;alert(&quot;XSS&quot;)&lt;/script&gt;'
 * ```
 */
export function escapeHtml (str: string): string {
  const s = String(str ?? '');
  const map: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
  };
  return s.replace(/[&<>"']/g, (ch) => map[ch]);
}

/**
 * Unescape a string from HTML into plain text.
 *
 * Replaces the named and numeric entities `escapeHtml` produces:
 * `&amp;`, `&lt;`, `&gt;`, `&quot;`, `&apos;`, `&#39;`
 *
 * @param str The string to unescape.
 * @returns The unescaped string.
 */
export function unescapeHtml (str: string): string {
  const s = String(str ?? '');
  return s.replace(/&(amp|lt|gt|quot|apos|#39);/gi, (m: string, ent: string) => {
    switch (ent.toLowerCase()) {
      case 'amp': return '&';
      case 'lt': return '<';
      case 'gt': return '>';
      case 'quot': return '"';
      case 'apos':
      case '#39': return "'";
      default: return m;
    }
  });
}

/**
 * A string that is already escaped (or trusted) and must not be escaped again.
 */
export class SafeString {
  private readonly value: string;

  constructor (value: string) {
    this.value = value;
  }

  get length (): number {
    return this.value.length;
  }

  toString (): string {
    return this.value;
  }

  toJSON (): string {
    return this.value;
  }
}

/**
 * Whether a value carries the "safe" mark.
 *
 * @param value - Value to test.
 * @returns True for SafeString instances.
 */
export const isSafe = (value: unknown): value is SafeString => value instanceof SafeString;

/**
 * Mark a string as safe for output. Safe values are returned as they are;
 * non-string values pass through untouched.
 *
 * @param value - Value to mark.
 */
export function markSafe (value: string): SafeString;
export function markSafe (value: unknown): unknown;
export function markSafe (value: unknown): unknown {
  if (typeof value === 'string') return new SafeString(value);
  return value;
}

/**
 * Escape a value for HTML unless it is already marked safe.
 *
 * @param value - Value to convert.
 * @returns The escaped (or trusted) text.
 */
export const conditionalEscape = (value: unknown): string => {
  if (isSafe(value)) return value.toString();
  return escapeHtml(String(value));
};
