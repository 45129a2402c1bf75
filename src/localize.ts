/**
 * Time zone conversion and localized formatting of rendered values.
 */

import dayjs from 'dayjs';
import type { Dayjs } from 'dayjs';
import timezone from 'dayjs/plugin/timezone.js';
import utc from 'dayjs/plugin/utc.js';

dayjs.extend(utc);
dayjs.extend(timezone);

export const DEFAULT_DATETIME_FORMAT = 'YYYY-MM-DD HH:mm:ss';

export interface LocalizeOptions {
  useL10n: boolean;
  locale: string;
  /** Zone used for `Intl` date formatting. */
  timeZone: string;
}

/**
 * Whether a value is a date the engine knows how to convert and format.
 */
export const isDateLike = (value: unknown): value is Date | Dayjs => {
  return value instanceof Date || dayjs.isDayjs(value);
};

/**
 * Convert a date to the given zone when `useTz` is on. Other values pass
 * through unchanged.
 *
 * @param value - Value to convert.
 * @param useTz - Whether time zone support is active.
 * @param timeZone - Target IANA zone.
 * @returns A Dayjs instance in `timeZone`, or the original value.
 */
export const templateLocaltime = (value: unknown, useTz: boolean, timeZone: string): unknown => {
  if (!useTz) return value;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? value : dayjs(value).tz(timeZone);
  }
  if (dayjs.isDayjs(value)) {
    return value.isValid() ? value.tz(timeZone) : value;
  }
  return value;
};

/**
 * Date as a Dayjs value; plain `Date`s are read in UTC.
 *
 * @param value - Date or Dayjs instance.
 */
export const toDayjs = (value: Date | Dayjs): Dayjs => {
  return dayjs.isDayjs(value) ? value : dayjs.utc(value);
};

/**
 * Format dates and (with `useL10n`) numbers for output. Everything else is
 * returned as it is.
 *
 * @param value - Value to format.
 * @param options - Localization settings of the current context.
 */
export const localize = (value: unknown, options: LocalizeOptions): unknown => {
  if (isDateLike(value)) {
    const date = toDayjs(value);
    if (!date.isValid()) return 'Invalid Date';
    if (options.useL10n) {
      return new Intl.DateTimeFormat(options.locale, {
        dateStyle: 'medium',
        timeStyle: 'medium',
        timeZone: options.timeZone,
      }).format(date.toDate());
    }
    return date.format(DEFAULT_DATETIME_FORMAT);
  }
  if (options.useL10n && ((typeof value === 'number' && Number.isFinite(value)) || typeof value === 'bigint')) {
    return new Intl.NumberFormat(options.locale, { maximumFractionDigits: 20 }).format(value);
  }
  return value;
};
