import {
  conditionalEscape,
  markSafe,
} from '../html-utils.js';

import {
  readFilterCallOptions,
} from '../library.js';

/**
 * Built-in `join` filter.
 *
 * Under autoescape each item is escaped (unless marked safe) before joining.
 * Values that are not arrays are returned unchanged.
 *
 * @param val - Input value.
 * @param separator - Text placed between items.
 * @param options - Call options; see `FilterCallOptions`.
 */
export function filterJoin (val: unknown, separator: unknown, options?: unknown): unknown {
  if (!Array.isArray(val)) return val;
  const { autoescape } = readFilterCallOptions(options);
  if (!autoescape) return markSafe(val.map(String).join(String(separator)));
  return markSafe(val.map((item) => conditionalEscape(item)).join(conditionalEscape(separator)));
}
