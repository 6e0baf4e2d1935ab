import { escapeHtml } from './escape.js';

/**
 * Shorten text to `length` characters.
 *
 * In HTML mode the cut text is escaped and wrapped in a span whose `title`
 * holds the full text; otherwise `...` is appended. Text that already fits
 * is returned unchanged (and unescaped).
 */
export function truncate (val: unknown, length: number, html = true): string {
  const str = (val === undefined || val === null) ? '' : String(val);
  if (str.length <= length) return str;

  const cut = str.slice(0, Math.max(0, length));
  if (!html) return `${cut}...`;
  return `<span title="${escapeHtml(str)}">${escapeHtml(cut)}&hellip;</span>`;
}
