import {
  markSafe,
} from '../html-utils.js';

import type {
  SafeString,
} from '../html-utils.js';

/**
 * Built-in `safe` filter: mark the value as not needing escaping.
 *
 * @param val - Input value.
 */
export function filterSafe (val: unknown): SafeString {
  return markSafe((val === undefined || val === null) ? '' : String(val));
}
