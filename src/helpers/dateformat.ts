import dayjs from 'dayjs';

/**
 * Input accepted by the date helpers.
 */
export type DateInput = string | number | Date | dayjs.Dayjs;

/**
 * Format a date with dayjs format tokens (`YYYY-MM-DD`, `[at] HH:mm`, ...).
 *
 * @returns The formatted date, or `''` for missing or invalid input.
 */
export function formatDate (val: DateInput | null | undefined, format = 'YYYY-MM-DD HH:mm:ss'): string {
  if (val === undefined || val === null) return '';

  const date = dayjs(val);
  if (!date.isValid()) return '';
  return date.format(format);
}
