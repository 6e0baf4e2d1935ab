/**
 * Turn text into a URL slug: `'Héllo, World!'` becomes `'hello-world'`.
 * Text without any ASCII letter or digit becomes `'n-a'`.
 */
export function slugify (val: unknown, divider = '-'): string {
  const str = (val === undefined || val === null) ? '' : String(val);
  const words = str
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((word) => word.length > 0);

  return words.length > 0 ? words.join(divider) : 'n-a';
}
