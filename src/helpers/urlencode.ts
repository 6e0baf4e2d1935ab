/**
 * Percent-encode a value for use in a URL component.
 */
export function urlencode (val: unknown): string {
  return encodeURIComponent((val === undefined || val === null) ? '' : String(val));
}
