import path from 'node:path';
import { z } from 'zod';

import { InvalidViewConfigError } from './errors.js';

/**
 * `'true'`/`'false'`/`'1'`/`'0'` from the environment to a boolean.
 */
const BooleanFlag = z
  .enum([ 'true', 'false', '1', '0' ])
  .transform((v) => v === 'true' || v === '1');

// Environment variables understood by the renderer.
const ViewEnvSchema = z.object({
  VIEWS_DIRECTORY: z.string().min(1).default('views'),
  VIEW_EXTENSION: z.string().regex(/^\.[\w.-]+$/, 'must start with a dot').default('.view.js'),
  VIEW_CACHE: BooleanFlag.optional(),
  VIEW_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  // any value; only 'production' changes a default
  NODE_ENV: z.string().default('development'),
});

/**
 * Resolved renderer configuration.
 */
export interface ViewConfig {
  /** Absolute templates root. */
  viewsDirectory: string;
  /** Extension appended to every template name, including the dot. */
  extension: string;
  /** Keep compiled scripts between renders. */
  cache: boolean;
  /** Abort a single template execution after this many milliseconds. */
  timeoutMs?: number;
}

/**
 * Read the renderer configuration from environment variables.
 *
 * @param env - Variables to read, `process.env` by default.
 * @param cwd - Base for a relative `VIEWS_DIRECTORY`.
 * @returns The validated configuration.
 * @throws InvalidViewConfigError when a variable has an unusable value.
 */
export function loadViewConfig (env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): ViewConfig {
  const parsed = ViewEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidViewConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  return {
    viewsDirectory: path.resolve(cwd, vars.VIEWS_DIRECTORY),
    extension: vars.VIEW_EXTENSION,
    // compiled scripts are only reused by default in production
    cache: vars.VIEW_CACHE ?? vars.NODE_ENV === 'production',
    timeoutMs: vars.VIEW_TIMEOUT_MS,
  };
}
