import dayjs from 'dayjs';
import type { Dayjs } from 'dayjs';

import {
  DEFAULT_DATETIME_FORMAT,
  isDateLike,
  toDayjs,
} from '../localize.js';

/**
 * Built-in `date` filter.
 *
 * Formats with dayjs format tokens (`YYYY-MM-DD`, `HH:mm`, `[literal]`, ...).
 * Dates arrive already converted to the context's time zone when time zone
 * support is on; plain dates, strings and timestamps are read as UTC.
 *
 * @param val - Date, Dayjs instance, ISO string or timestamp.
 * @param format - Format string; defaults to `YYYY-MM-DD HH:mm:ss`.
 * @returns Formatted date, or an empty string for missing or invalid input.
 */
export function filterDate (val: unknown, format?: unknown): string {
  if (val === undefined || val === null || val === '') return '';

  let date: Dayjs;
  if (isDateLike(val)) {
    date = toDayjs(val);
  } else if (typeof val === 'string' || typeof val === 'number') {
    date = dayjs.utc(val);
  } else {
    return '';
  }
  if (!date.isValid()) return '';

  const fmt = (format === undefined || format === null) ? DEFAULT_DATETIME_FORMAT : String(format);
  return date.format(fmt);
}
