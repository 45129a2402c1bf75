import {
  SafeString,
} from '../html-utils.js';

/**
 * Built-in `length` filter.
 *
 * Strings and arrays give their length, Maps and Sets their size, plain
 * objects their number of own keys. Anything else is 0.
 *
 * @param val - Input value.
 */
export function filterLength (val: unknown): number {
  if (typeof val === 'string' || Array.isArray(val) || val instanceof SafeString) return val.length;
  if (val instanceof Map || val instanceof Set) return val.size;
  if (val !== null && typeof val === 'object' && Object.getPrototypeOf(val) === Object.prototype) {
    return Object.keys(val).length;
  }
  return 0;
}
