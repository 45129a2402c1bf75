export const TRUNCATION_MARK = '…';

/**
 * Built-in `truncatechars` filter.
 *
 * Text longer than `length` characters is cut so that, with a trailing `…`,
 * it is exactly `length` characters long. A length that is not a number
 * leaves the value unchanged.
 *
 * @param val - Input value.
 * @param length - Maximum length, mark included.
 */
export function filterTruncatechars (val: unknown, length: unknown): unknown {
  const max = Number.parseInt(String(length), 10);
  if (Number.isNaN(max)) return val;

  const chars = [ ...((val === undefined || val === null) ? '' : String(val)) ];
  if (chars.length <= max) return chars.join('');
  if (max <= 0) return TRUNCATION_MARK;
  return chars.slice(0, max - 1).join('') + TRUNCATION_MARK;
}
