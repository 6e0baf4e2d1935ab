/*!
 * viewkit
 *
 * View rendering for script templates: nested renders with isolated scopes,
 * stacked output capture and a final HTML clean-up pass.
 *
 * Licensed under the MIT License.
 */

import { loadViewConfig } from './config.js';
import type { ViewBindings, ViewContext } from './types.js';
import {
  ViewRenderer,
  type ViewRendererOptions,
} from './view-renderer.js';

export {
  ViewRenderer,
  DEFAULT_VIEW_EXTENSION,
  type ViewRendererOptions,
} from './view-renderer.js';

export {
  OutputCapture,
  type FrameHandle,
} from './output-capture.js';

export {
  bindScope,
  type ViewScope,
} from './scope-binder.js';

export { TemplateResolver } from './template-resolver.js';

export {
  sanitizeOutput,
  SANITIZER_PASSES,
  type SanitizerPass,
} from './sanitizer.js';

export {
  ScriptHost,
  type ScriptHostOptions,
} from './script-host.js';

export {
  ComponentRegistry,
  COMPONENT_SUFFIX,
} from './components.js';

export {
  createViewUtilities,
  getViewHelper,
  registerViewHelper,
  type ViewUtilities,
} from './utilities.js';

export { escapeHtml, unescapeHtml } from './helpers/escape.js';
export { formatDate, type DateInput } from './helpers/dateformat.js';
export { formatNumber } from './helpers/number.js';
export { slugify } from './helpers/slugify.js';
export { timeAgo } from './helpers/time-ago.js';
export { truncate } from './helpers/truncate.js';

export {
  ViewError,
  TemplateNotFoundError,
  CaptureImbalanceError,
  InvalidViewConfigError,
} from './errors.js';

export {
  loadViewConfig,
  type ViewConfig,
} from './config.js';

export {
  logger,
  silentLogger,
  type Logger,
} from './logger.js';

export type * from './types.js';

/**
 * Create a renderer, filling options the caller leaves out from the
 * environment (see {@link loadViewConfig}).
 *
 * @param context - Ambient services for every template.
 * @param options - Explicit options; they win over the environment.
 */
export function createViewRenderer (context: ViewContext = {}, options: Partial<ViewRendererOptions> = {}): ViewRenderer {
  const config = loadViewConfig();
  return new ViewRenderer(context, {
    viewsDirectory: config.viewsDirectory,
    extension: config.extension,
    cache: config.cache,
    timeoutMs: config.timeoutMs,
    ...options,
  });
}

/**
 * Render a template to a string with a one-off renderer.
 *
 * The result is the raw template output, not sanitized.
 *
 * @returns The output, or `undefined` if the template does not exist.
 */
export function renderView (
  template: string,
  bindings: ViewBindings = {},
  options: Partial<ViewRendererOptions> & { context?: ViewContext } = {},
): string | undefined {
  const { context, ...rest } = options;
  return createViewRenderer(context, rest).render(template, bindings, true);
}
