#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';

// Load environment variables
import 'dotenv/config';

import { ComponentRegistry } from './components.js';
import { loadViewConfig } from './config.js';
import { logger } from './logger.js';
import { ScriptHost } from './script-host.js';
import type { ViewBindings } from './types.js';
import { ViewRenderer } from './view-renderer.js';

interface RenderCommandOptions {
  views?: string;
  ext?: string;
  data?: ViewBindings;
  dataFile?: string;
  components?: string;
  raw?: boolean;
}

/**
 * Parse a JSON object given on the command line.
 */
function parseBindings (value: string): ViewBindings {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (err) {
    throw new InvalidArgumentError(`Not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new InvalidArgumentError('Template data must be a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

const program = new Command();

program
  .name('viewkit')
  .description('Render view templates from the command line')
  .version('1.0.0');

program
  .command('render')
  .description('Render a template to stdout')
  .argument('<template>', 'template name relative to the views directory, without extension')
  .option('--views <dir>', 'views directory (default: $VIEWS_DIRECTORY or ./views)')
  .option('--ext <ext>', 'template file extension (default: $VIEW_EXTENSION or .view.js)')
  .option('--data <json>', 'template variables as a JSON object', parseBindings)
  .option('--data-file <path>', 'read template variables from a JSON file')
  .option('--components <dir>', 'load *.component.js files from this directory')
  .option('--raw', 'print the raw output, without sanitizing it')
  .action((template: string, options: RenderCommandOptions) => {
    const config = loadViewConfig();
    const host = new ScriptHost({ cache: false, timeoutMs: config.timeoutMs });

    const components = new ComponentRegistry(logger);
    if (options.components) {
      const names = components.loadFromDirectory(path.resolve(options.components), host);
      logger.debug({ components: names }, 'Components loaded');
    }

    const bindings: ViewBindings = {
      ...(options.dataFile ? parseBindings(fs.readFileSync(options.dataFile, 'utf8')) : {}),
      ...options.data,
    };

    const context = { components };
    components.attach(context);

    const view = new ViewRenderer(context, {
      viewsDirectory: options.views ? path.resolve(options.views) : config.viewsDirectory,
      extension: options.ext ?? config.extension,
      output: process.stdout,
      host,
      logger,
    });

    if (!view.exists(template)) {
      logger.error({ template, path: view.resolver.pathFor(template) }, 'Template not found');
      process.exitCode = 1;
      return;
    }

    if (options.raw) {
      process.stdout.write(view.render(template, bindings, true) ?? '');
    } else {
      view.render(template, bindings);
    }
  });

// Parse and execute
program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error({ err: error }, 'Command failed');
  process.exit(1);
});
