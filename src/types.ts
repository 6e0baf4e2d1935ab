import type { ComponentRegistry } from './components.js';

/**
 * Caller-supplied template variables. Keys are not validated and values are
 * passed through untouched.
 */
export type ViewBindings = Record<string, unknown>;

/**
 * Destination for text emitted while no capture frame is open.
 * Node's writable streams and `http.ServerResponse` satisfy this.
 */
export interface OutputSink {
  write: (chunk: string) => unknown;
}

/**
 * Request data exposed to templates. Implemented by the host's HTTP layer.
 */
export interface RequestAccessor {
  method: () => string;
  url: () => string;
  get: (key: string) => unknown;
  post: (key: string) => unknown;
  header: (key: string) => string | undefined;
  referer: () => string | undefined;
}

/**
 * Session state exposed to templates.
 */
export interface SessionAccessor {
  getFlashData: (key: string) => unknown;
  getStateData: (key: string) => unknown;
}

/**
 * Authentication state exposed to templates.
 */
export interface AuthAccessor {
  /** Current identity, or `null` for guests. */
  user: Record<string, unknown> | null;
  is: (group: string) => boolean;
}

/**
 * Security helpers exposed to templates.
 */
export interface SecurityHelper {
  /** Hidden form field carrying the CSRF token. */
  csrfInput: () => string;
}

/**
 * Ambient services handed to a renderer once, at construction.
 *
 * The renderer reads from it and never writes to it. Entries the host does
 * not provide are still bound in every scope, as `undefined`.
 */
export interface ViewContext {
  baseUrl?: string;
  request?: RequestAccessor;
  session?: SessionAccessor;
  auth?: AuthAccessor;
  security?: SecurityHelper;
  components?: ComponentRegistry;
  /** Service lookup by name (the host container). */
  services?: (name: string) => unknown;
}

/**
 * Renders a named component from its data. Returns the markup.
 */
export type ComponentHandler = (context: ViewContext, data: Record<string, unknown>) => string;

/**
 * A helper callable from templates through `utilities.<name>(...)`.
 */
export type ViewHelper = (...args: never[]) => unknown;
