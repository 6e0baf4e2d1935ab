import { ComponentRegistry } from './components.js';
import { TemplateNotFoundError } from './errors.js';
import { logger as baseLogger, type Logger } from './logger.js';
import { OutputCapture } from './output-capture.js';
import { sanitizeOutput } from './sanitizer.js';
import { bindScope } from './scope-binder.js';
import { ScriptHost } from './script-host.js';
import { TemplateResolver } from './template-resolver.js';
import type { OutputSink, ViewBindings, ViewContext } from './types.js';
import { createViewUtilities, type ViewUtilities } from './utilities.js';

/**
 * Default extension of template files.
 */
export const DEFAULT_VIEW_EXTENSION = '.view.js';

export interface ViewRendererOptions {
  /** Templates root. */
  viewsDirectory: string;
  /** Template file extension, `.view.js` by default. */
  extension?: string;
  /** Reuse compiled templates. Ignored when `host` is given. */
  cache?: boolean;
  /** Abort one template execution after this long. Ignored when `host` is given. */
  timeoutMs?: number;
  /**
   * Where emitted output goes once no capture frame is open, usually the
   * response of the current request. Defaults to `process.stdout`.
   */
  output?: OutputSink;
  /** Share compiled scripts between renderers, e.g. one renderer per request. */
  host?: ScriptHost;
  logger?: Logger;
}

/**
 * Renders named template scripts.
 *
 * A renderer belongs to one request: it owns the output capture stack for
 * that request and is handed the request's ambient context once. Every
 * template sees these names, unless the caller binds the same name:
 *
 * - `instance` - the context itself
 * - `baseUrl`, `request`, `session`, `auth`, `security` - from the context
 * - `components` - the context's component registry (an empty one if absent)
 * - `utilities` - view helpers, see {@link createViewUtilities}
 * - `service(name)` - service lookup through the context
 * - `view` - this renderer, for nested renders
 *
 * plus `templateArgs` (the caller's bindings as passed), `scope` and
 * `echo`/`print`.
 *
 * @example
 * ```ts
 * const view = new ViewRenderer(context, { viewsDirectory: 'views', output: res });
 * view.render('user/profile', { user });
 * // from inside a template:
 * // echo(view.render('partials/card', { title }, true));
 * ```
 */
export class ViewRenderer {
  readonly resolver: TemplateResolver;
  readonly utilities: ViewUtilities;

  private readonly capture: OutputCapture;
  private readonly host: ScriptHost;
  private readonly ambient: Readonly<Record<string, unknown>>;
  private readonly log: Logger;

  constructor (
    readonly context: ViewContext,
    options: ViewRendererOptions,
  ) {
    this.log = (options.logger ?? baseLogger).child({ module: 'view-renderer' });
    this.resolver = new TemplateResolver(options.viewsDirectory, options.extension ?? DEFAULT_VIEW_EXTENSION);
    this.capture = new OutputCapture(options.output ?? process.stdout);
    this.host = options.host ?? new ScriptHost({ cache: options.cache, timeoutMs: options.timeoutMs });
    this.utilities = createViewUtilities();

    const components = context.components ?? new ComponentRegistry(options.logger).attach(context);
    this.ambient = Object.freeze({
      instance: context,
      baseUrl: context.baseUrl,
      security: context.security,
      session: context.session,
      request: context.request,
      view: this,
      auth: context.auth,
      components,
      utilities: this.utilities,
      service: (name: string): unknown => context.services?.(name),
    });
  }

  /**
   * Number of renders currently in progress on this renderer.
   */
  get depth (): number {
    return this.capture.depth;
  }

  /**
   * Whether a template with this name exists.
   */
  exists (template: string): boolean {
    return this.resolver.exists(template);
  }

  /**
   * Render a template.
   *
   * In emit mode (the default) the output is sanitized and written to the
   * current output: the enclosing template's buffer when called from a
   * template, otherwise the renderer's output sink. In return mode the raw,
   * unsanitized output is returned instead.
   *
   * A missing template is logged and renders nothing; in return mode the
   * result is `undefined`. Errors thrown by the template propagate unchanged.
   *
   * @param template - Template name relative to the views root, without extension.
   * @param bindings - Variables for the template; they shadow ambient names.
   * @param returnMode - Return the output instead of emitting it.
   */
  render (template: string, bindings?: ViewBindings, returnMode?: false): void;
  render (template: string, bindings: ViewBindings, returnMode: true): string | undefined;
  render (template: string, bindings?: ViewBindings, returnMode?: boolean): string | undefined;
  render (template: string, bindings: ViewBindings = {}, returnMode = false): string | undefined {
    const file = this.locate(template);
    if (file === undefined) return undefined;

    const text = this.capture.capture(() => {
      const scope = bindScope(this.ambient, bindings);
      this.host.execute(file, scope, (chunk) => this.capture.write(chunk));
    });

    if (returnMode) return text;

    this.capture.write(sanitizeOutput(text, this.log));
    return undefined;
  }

  /**
   * Resolve a template, reporting a missing one instead of throwing.
   */
  private locate (template: string): string | undefined {
    try {
      return this.resolver.resolve(template);
    } catch (err) {
      if (err instanceof TemplateNotFoundError) {
        this.log.warn({ template, path: err.path }, err.message);
        return undefined;
      }
      throw err;
    }
  }
}
