import type { ViewBindings } from './types.js';

/**
 * Variables visible to one template execution.
 */
export interface ViewScope {
  /** Ambient names overlaid with the caller's bindings. */
  readonly variables: Record<string, unknown>;
  /** The caller's bindings exactly as passed, frozen. */
  readonly templateArgs: Readonly<ViewBindings>;
  /**
   * Resolve an identifier or dot-path (`user.name`), caller bindings first.
   * Only own data properties are read; getters are never invoked.
   */
  get: (path: string) => unknown;
  /** Whether `name` is bound, ambiently or by the caller. */
  has: (name: string) => boolean;
  /** All bound names, ambient names first. */
  keys: () => string[];
}

const hasOwn = (obj: object, key: string): boolean => Object.prototype.hasOwnProperty.call(obj, key);

/**
 * Read an own data property, skipping accessors.
 */
const readOwn = (obj: unknown, key: string): { found: boolean, value?: unknown } => {
  if (typeof obj !== 'object' && typeof obj !== 'function') return { found: false };
  if (obj === null || !hasOwn(obj, key)) return { found: false };
  const desc = Object.getOwnPropertyDescriptor(obj, key);
  if (!desc || typeof desc.get === 'function' || typeof desc.set === 'function') return { found: false };
  return { found: true, value: desc.value };
};

/**
 * Define `key` as a plain own property, so names such as `__proto__` are
 * bound like any other.
 */
const bind = (target: Record<string, unknown>, key: string, value: unknown): void => {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
};

/**
 * Resolve path segments from a value.
 *
 * @returns The value, or undefined if any segment is missing.
 */
export const scopeResolveFrom = (obj: unknown, path: string[]): unknown => {
  let cur: unknown = obj;
  for (const seg of path) {
    const r = readOwn(cur, seg);
    if (!r.found) return undefined;
    cur = r.value;
  }
  return cur;
};

/**
 * Resolve a dot-path across scope layers; the last layer shadows the others.
 */
export const scopeResolveKey = (layers: readonly object[], key: string): unknown => {
  const parts = key.split('.');
  for (let i = layers.length - 1; i >= 0; i--) {
    const r = readOwn(layers[i], parts[0]);
    if (r.found) return scopeResolveFrom(r.value, parts.slice(1));
  }
  return undefined;
};

/**
 * Merge ambient names and caller bindings into a scope.
 *
 * Ambient names go in first, then every binding is assigned over them, so a
 * caller always wins on a name clash. Keys and values are taken as they are.
 *
 * @param ambient - Names every template sees.
 * @param bindings - Caller-supplied variables.
 * @returns A scope owned by a single template execution.
 */
export function bindScope (ambient: Record<string, unknown>, bindings: ViewBindings = {}): ViewScope {
  const variables: Record<string, unknown> = {};
  for (const key of Object.keys(ambient)) {
    bind(variables, key, ambient[key]);
  }
  for (const key of Object.keys(bindings)) {
    bind(variables, key, bindings[key]);
  }

  const templateArgs = Object.freeze({ ...bindings });
  const layers = [ ambient, templateArgs ] as const;

  return {
    variables,
    templateArgs,
    get: (path) => scopeResolveKey(layers, path),
    has: (name) => hasOwn(variables, name),
    keys: () => Object.keys(variables),
  };
}
