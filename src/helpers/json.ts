/**
 * `JSON.stringify(val)`, or `''` when there is nothing to serialize.
 */
export function toJson (val: unknown, indent?: number): string {
  return JSON.stringify(val, undefined, indent) ?? '';
}
