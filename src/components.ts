import path from 'node:path';
import { globSync } from 'glob';

import { logger as baseLogger, type Logger } from './logger.js';
import type { ScriptHost } from './script-host.js';
import type { ComponentHandler, ViewContext } from './types.js';

/**
 * File suffix of component scripts picked up by
 * {@link ComponentRegistry.loadFromDirectory}.
 */
export const COMPONENT_SUFFIX = '.component.js';

const COMPONENT_NAME = /^[A-Za-z_][\w-]*(?:\.[A-Za-z_][\w-]*)*$/;

/**
 * Named, reusable markup fragments (`UI.Alert`, `Form.Input`).
 *
 * A component is a function of the ambient context and its data that
 * returns markup; templates call `components.render('UI.Alert', {...})`
 * and echo the result.
 */
export class ComponentRegistry {
  private readonly handlers = new Map<string, ComponentHandler>();
  private context: ViewContext = {};
  private readonly log: Logger;

  constructor (logger: Logger = baseLogger) {
    this.log = logger.child({ module: 'components' });
  }

  /**
   * Set the context passed to component handlers. Done by the host once the
   * context object that holds this registry is complete.
   */
  attach (context: ViewContext): this {
    this.context = context;
    return this;
  }

  /**
   * Register (or replace) a component.
   *
   * @param name - Dot-separated name, e.g. `Layout.StatCard`.
   * @param handler - Function returning the component's markup.
   */
  register (name: string, handler: ComponentHandler): this {
    if (!COMPONENT_NAME.test(name)) {
      throw new TypeError(`Invalid component name: ${name}`);
    }
    if (typeof handler !== 'function') {
      throw new TypeError('Component handler must be a function');
    }
    this.handlers.set(name, handler);
    return this;
  }

  /**
   * Render a component.
   *
   * @returns The markup, or `undefined` if no such component is registered.
   */
  render (name: string, data: Record<string, unknown> = {}): string | undefined {
    const handler = this.handlers.get(name);
    if (!handler) {
      this.log.debug({ component: name }, 'Unknown component');
      return undefined;
    }
    return handler(this.context, data);
  }

  exists (name: string): boolean {
    return this.handlers.has(name);
  }

  /**
   * Registered component names, sorted.
   */
  names (): string[] {
    return [ ...this.handlers.keys() ].sort();
  }

  /**
   * Register every `*.component.js` script below `directory`.
   *
   * The script's completion value must be a function; sub-directories become
   * name segments, so `UI/Alert.component.js` registers `UI.Alert`. Other
   * scripts are skipped. A missing directory registers nothing.
   *
   * @returns Names registered by this call.
   */
  loadFromDirectory (directory: string, host: ScriptHost): string[] {
    const files = globSync(`**/*${COMPONENT_SUFFIX}`, { cwd: directory, nodir: true, posix: true }).sort();
    const loaded: string[] = [];

    for (const rel of files) {
      const name = rel.slice(0, -COMPONENT_SUFFIX.length).split('/').join('.');
      const handler = host.evaluate(path.join(directory, rel));
      if (typeof handler !== 'function') {
        this.log.debug({ component: name, file: rel }, 'Component script does not evaluate to a function, skipped');
        continue;
      }
      this.register(name, (context, data) => {
        const markup: unknown = handler(context, data);
        return (markup === undefined || markup === null) ? '' : String(markup);
      });
      loaded.push(name);
    }

    return loaded;
  }
}
