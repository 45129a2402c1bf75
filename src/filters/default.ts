import { isTruthy } from '../tags/if.js';

/**
 * Built-in `default` filter: `fallback` when the value is falsy (as `{% if %}`
 * sees it), the value otherwise.
 *
 * @param val - Input value.
 * @param fallback - Replacement value.
 */
export function filterDefault (val: unknown, fallback: unknown): unknown {
  return isTruthy(val) ? val : fallback;
}
