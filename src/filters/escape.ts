import {
  conditionalEscape,
  markSafe,
} from '../html-utils.js';

import type {
  SafeString,
} from '../html-utils.js';

/**
 * Built-in `escape` filter. Values already marked safe are left alone.
 *
 * @param val - Input value.
 * @returns Escaped text, marked safe.
 */
export function filterEscape (val: unknown): SafeString {
  return markSafe((val === undefined || val === null) ? '' : conditionalEscape(val));
}
