/**
 * Format a numeric value with fixed decimals and optional separators.
 *
 * - `formatNumber(v)`: plain `String(v)`
 * - `formatNumber(v, 2)`: `1337.42`
 * - `formatNumber(v, 2, ',')`: `1337,42`
 * - `formatNumber(v, 2, ',', '.')`: `1.337,42`
 *
 * Values that are not finite numbers are stringified unchanged (`''` for
 * `null`/`undefined`).
 */
export function formatNumber (val: unknown, decimals?: number, decimalSep = '.', thousandsSep = ''): string {
  const num = (typeof val === 'number') ? val : Number(val);
  if (val === null || val === undefined || val === '' || !Number.isFinite(num)) {
    return (val === undefined || val === null) ? '' : String(val);
  }

  const digits = (typeof decimals === 'number') ? Math.max(0, Math.floor(decimals)) : undefined;
  const s = (digits === undefined) ? String(num) : num.toFixed(digits);
  const m = /^(-?)(\d+)(?:\.(\d+))?$/.exec(s);
  // exponent notation and the like pass through as-is
  if (!m) return s;

  const sign = m[1];
  const intPart = m[2];
  const frac = m[3] ?? '';
  const grouped = (thousandsSep.length > 0)
    ? intPart.replace(/\B(?=(\d{3})+(?!\d))/g, thousandsSep)
    : intPart;
  return sign + grouped + (frac.length > 0 ? decimalSep + frac : '');
}
