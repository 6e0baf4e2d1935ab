import dayjs from 'dayjs';

import type { DateInput } from './dateformat.js';

const UNITS = [ 'year', 'month', 'day', 'hour', 'minute' ] as const;

/**
 * Describe how long ago a date was, using the largest whole unit:
 * `'1 second ago'`, `'5 minutes ago'`, `'2 years ago'`.
 *
 * @param val - Past date.
 * @param now - Reference point, the current time by default.
 * @returns The description, or `''` for invalid input.
 */
export function timeAgo (val: DateInput, now: DateInput = new Date()): string {
  const date = dayjs(val);
  const ref = dayjs(now);
  if (!date.isValid() || !ref.isValid()) return '';

  for (const unit of UNITS) {
    const n = ref.diff(date, unit);
    if (n > 0) return `${n} ${unit}${n === 1 ? '' : 's'} ago`;
  }
  const seconds = Math.max(0, ref.diff(date, 'second'));
  return `${seconds} second${seconds === 1 ? '' : 's'} ago`;
}
