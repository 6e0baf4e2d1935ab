import { randomUUID } from 'node:crypto';

/**
 * Random RFC 4122 version 4 UUID.
 */
export function uuid (): string {
  return randomUUID();
}
