const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

/**
 * Escape a value for HTML text or attribute contexts.
 *
 * Encodes `&`, `<`, `>`, `"` and `'`. `null` and `undefined` become `''`,
 * other non-strings are stringified first.
 *
 * @example
 * ```ts
 * escapeHtml('<script>alert("XSS")</script>');
 * // '&lt;script&gt;alert(&quot;XSS&quot;)&lt;/script&gt;'
 * ```
 */
export function escapeHtml (val: unknown): string {
  const s = (val === undefined || val === null) ? '' : String(val);
  return s.replace(/[&<>"']/g, (ch) => ESCAPES[ch] ?? ch);
}

const UNESCAPES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  '#39': "'",
};

/**
 * Reverse {@link escapeHtml}. Handles `&amp;`, `&lt;`, `&gt;`, `&quot;`,
 * `&apos;` and `&#39;`; any other entity is left alone.
 */
export function unescapeHtml (val: unknown): string {
  const s = (val === undefined || val === null) ? '' : String(val);
  return s.replace(/&(amp|lt|gt|quot|apos|#39);/gi, (entity: string, name: string) => UNESCAPES[name.toLowerCase()] ?? entity);
}
