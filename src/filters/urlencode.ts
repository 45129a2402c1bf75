const reLoneSurrogate = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * Built-in `urlencode` filter.
 *
 * Percent-encodes everything except letters, digits, `_.-~` and the
 * characters in `safe` (default `/`).
 *
 * @param val - Input value.
 * @param safe - Characters to leave unencoded.
 * @returns URL-encoded string representation.
 */
export function filterUrlencode (val: unknown, safe?: unknown): string {
  const keep = (safe === undefined || safe === null) ? '/' : String(safe);
  // unpaired surrogates become U+FFFD
  const str = ((val === undefined || val === null) ? '' : String(val)).replace(reLoneSurrogate, '\uFFFD');
  let out = '';
  for (const ch of str) {
    if (keep.includes(ch)) {
      out += ch;
    } else {
      out += encodeURIComponent(ch).replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
    }
  }
  return out;
}
