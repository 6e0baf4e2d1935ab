import fs from 'node:fs';
import vm from 'node:vm';

import type { ViewScope } from './scope-binder.js';

export interface ScriptHostOptions {
  /** Reuse compiled scripts until the file changes. */
  cache?: boolean;
  /** Abort a single execution after this many milliseconds. */
  timeoutMs?: number;
}

interface CachedScript {
  mtimeMs: number;
  script: vm.Script;
}

/**
 * Stringify values handed to `echo`. `null`, `undefined` and `false` print
 * nothing, so `echo(cond && '<b>')` works as expected.
 */
const toOutput = (value: unknown): string | undefined => {
  if (value === undefined || value === null || value === false) return undefined;
  return (typeof value === 'string') ? value : String(value);
};

/**
 * Runs template and component files as JavaScript script bodies.
 *
 * Every execution gets a fresh `vm` context whose globals are the scope's
 * variables, so a template can neither see nor leave behind anything from
 * another execution. Execution is synchronous.
 */
export class ScriptHost {
  private readonly scripts = new Map<string, CachedScript>();

  constructor (private readonly options: ScriptHostOptions = {}) {}

  /**
   * Run a template file with `scope` as its variable environment.
   *
   * Besides the scope's variables the script sees `templateArgs`, `scope`,
   * and `echo(...values)` / `print(...values)` which send text to `write`.
   * These four names shadow caller bindings of the same name.
   *
   * @throws Whatever the script throws, unchanged.
   */
  execute (file: string, scope: ViewScope, write: (text: string) => void): void {
    const echo = (...values: unknown[]): void => {
      for (const value of values) {
        const text = toOutput(value);
        if (text !== undefined) write(text);
      }
    };

    const globals: Record<string, unknown> = { ...scope.variables };
    globals.templateArgs = scope.templateArgs;
    globals.scope = scope;
    globals.echo = echo;
    globals.print = echo;

    this.run(file, globals);
  }

  /**
   * Run a script file and return its completion value, e.g. the function
   * expression a component file ends with.
   */
  evaluate (file: string, globals: Record<string, unknown> = {}): unknown {
    return this.run(file, { ...globals });
  }

  /**
   * Forget all compiled scripts.
   */
  clear (): void {
    this.scripts.clear();
  }

  private run (file: string, globals: Record<string, unknown>): unknown {
    const script = this.compile(file);
    const context = vm.createContext(globals);
    const runOptions: vm.RunningScriptOptions = { displayErrors: true };
    if (this.options.timeoutMs !== undefined) {
      runOptions.timeout = this.options.timeoutMs;
    }
    return script.runInContext(context, runOptions);
  }

  private compile (file: string): vm.Script {
    if (!this.options.cache) {
      return new vm.Script(fs.readFileSync(file, 'utf8'), { filename: file });
    }

    const { mtimeMs } = fs.statSync(file);
    const cached = this.scripts.get(file);
    if (cached && cached.mtimeMs === mtimeMs) return cached.script;

    const script = new vm.Script(fs.readFileSync(file, 'utf8'), { filename: file });
    this.scripts.set(file, { mtimeMs, script });
    return script;
  }
}
