import type { ViewHelper } from './types.js';

import { formatDate } from './helpers/dateformat.js';
import { escapeHtml, unescapeHtml } from './helpers/escape.js';
import { toJson } from './helpers/json.js';
import { formatNumber } from './helpers/number.js';
import { ordinalSuffix } from './helpers/ordinal.js';
import { slugify } from './helpers/slugify.js';
import { timeAgo } from './helpers/time-ago.js';
import { truncate } from './helpers/truncate.js';
import { urlencode } from './helpers/urlencode.js';
import { uuid } from './helpers/uuid.js';

/**
 * Built-in helpers, available to every template as `utilities.<name>`.
 */
const builtinHelpers = {
  dateformat: formatDate,
  escape: escapeHtml,
  json: toJson,
  number: formatNumber,
  ordinalSuffix,
  slugify,
  timeAgo,
  truncate,
  unescape: unescapeHtml,
  urlencode,
  uuid,
};

/**
 * The `utilities` object templates receive: the built-ins plus every helper
 * registered through {@link registerViewHelper}.
 */
export type ViewUtilities = Readonly<Record<string, ViewHelper>>;

/**
 * Internal registry for view helpers.
 */
const viewHelperRegistry = new Map<string, ViewHelper>(Object.entries(builtinHelpers));

/**
 * Register (or override) a view helper.
 *
 * Renderers created afterwards expose it as `utilities.<name>`; renderers
 * that already exist keep the snapshot they were built with.
 *
 * @param name - Helper name (must match `/^[a-z][\w]*$/`).
 * @param handler - The helper function.
 */
export const registerViewHelper = (name: string, handler: ViewHelper): void => {
  if (!/^[a-z][\w]*$/.test(name)) {
    throw new TypeError(`Invalid helper name: ${name}`);
  }
  if (typeof handler !== 'function') {
    throw new TypeError('Helper must be a function');
  }
  viewHelperRegistry.set(name, handler);
};

/**
 * Look up a registered helper.
 */
export const getViewHelper = (name: string): ViewHelper | undefined => {
  return viewHelperRegistry.get(name);
};

/**
 * Snapshot the registry into a frozen `utilities` object.
 */
export const createViewUtilities = (): ViewUtilities => {
  return Object.freeze(Object.fromEntries(viewHelperRegistry));
};
