/*
 * Benchmark rendering and sanitizing templates.
 *
 * Notes:
 * - This is a micro-benchmark. Results vary by machine and Node.js version.
 * - "render" runs a template in return mode, "emit" adds the sanitizer pass,
 *   "sanitize" runs the sanitizer alone on pre-rendered markup.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { performance } from 'node:perf_hooks';

import { silentLogger } from '../src/logger.js';
import { sanitizeOutput } from '../src/sanitizer.js';
import { ScriptHost } from '../src/script-host.js';
import type { OutputSink, ViewBindings } from '../src/types.js';
import { ViewRenderer } from '../src/view-renderer.js';

const KINDS = [ 'render', 'emit', 'sanitize' ] as const;
const FORMATS = [ 'table', 'md', 'json' ] as const;

type BenchmarkKind = typeof KINDS[number];
type OutputFormat = typeof FORMATS[number];

interface BenchmarkResult {
  kind: BenchmarkKind;
  scenario: string;
  iterations: number;
  totalMs: number;
  msPerOp: number;
  opsPerSec: number;
}

interface Scenario {
  name: string;
  template: string;
  data: ViewBindings;
}

const isKind = (v: string): v is BenchmarkKind => KINDS.some((k) => k === v);
const isFormat = (v: string): v is OutputFormat => FORMATS.some((f) => f === v);

function parseArgs (argv: string[]): {
  iterations: number;
  warmup: number;
  cache: boolean;
  format: OutputFormat;
  mode: 'all' | BenchmarkKind;
} {
  const out: {
    iterations: number;
    warmup: number;
    cache: boolean;
    format: OutputFormat;
    mode: 'all' | BenchmarkKind;
  } = {
    iterations: 5_000,
    warmup: 500,
    cache: true,
    format: 'table',
    mode: 'all',
  };

  for (const arg of argv) {
    const num = /^--(iterations|warmup)=(\d+)$/.exec(arg);
    if (num) {
      const value = Number.parseInt(num[2] ?? '', 10);
      if (!Number.isFinite(value) || value < 0) continue;
      if (num[1] === 'iterations') out.iterations = value;
      if (num[1] === 'warmup') out.warmup = value;
      continue;
    }

    if (arg === '--no-cache') out.cache = false;

    const format = /^--format=(\w+)$/.exec(arg)?.[1];
    if (format !== undefined && isFormat(format)) out.format = format;

    const mode = /^--mode=(\w+)$/.exec(arg)?.[1];
    if (mode === 'all') out.mode = mode;
    else if (mode !== undefined && isKind(mode)) out.mode = mode;
  }

  // keep things sane
  out.warmup = Math.max(0, Math.min(out.warmup, 200_000));
  out.iterations = Math.max(1, Math.min(out.iterations, 2_000_000));

  return out;
}

function measure (kind: BenchmarkKind, scenario: string, iterations: number, warmup: number, op: () => number): BenchmarkResult {
  let sink = 0;
  for (let i = 0; i < warmup; i++) sink += op();

  const start = performance.now();
  for (let i = 0; i < iterations; i++) sink += op();
  const end = performance.now();

  if (sink === Number.NEGATIVE_INFINITY) {
    // Prevent DCE in case of overly aggressive optimizations.
    console.log('sink', sink);
  }

  const totalMs = end - start;
  return {
    kind,
    scenario,
    iterations,
    totalMs,
    msPerOp: totalMs / iterations,
    opsPerSec: (iterations / totalMs) * 1000,
  };
}

function main (): void {
  const args = parseArgs(process.argv.slice(2));

  if (process.execArgv.some((a) => a.startsWith('--inspect'))) {
    console.warn('Warning: Node inspector is enabled; benchmark results will be distorted.');
    console.warn('');
  }

  const scenarios: Scenario[] = [
    {
      name: 'small (one echo)',
      template: "echo('Hello, ', utilities.escape(name), '!');",
      data: { name: 'Alice' },
    },
    {
      name: 'medium (loop + partial)',
      template: [
        "echo('<ul>\\n');",
        "for (const item of items) echo('  <li>', view.render('row', { item: item }, true), '</li>\\n');",
        "echo('</ul>\\n\\n\\n<!-- end -->');",
      ].join('\n'),
      data: {
        items: [ 'Foo', 'Bar', 'Baz', 'Qux' ],
      },
    },
    {
      name: 'large (many rows)',
      template: "for (let i = 0; i < 80; i++) echo('<p>Row ', i, ': ', user.name, ' - ', user.email, '</p>   \\n');",
      data: {
        user: {
          name: 'Alice',
          email: 'alice@example.test',
        },
      },
    },
  ];

  const viewsDirectory = fs.mkdtempSync(path.join(os.tmpdir(), 'viewkit-bench-'));
  const discard: OutputSink = { write: () => true };

  try {
    fs.writeFileSync(path.join(viewsDirectory, 'row.view.js'), "echo(utilities.escape(item));");
    scenarios.forEach((scenario, i) => {
      fs.writeFileSync(path.join(viewsDirectory, `scenario-${i}.view.js`), scenario.template);
    });

    const view = new ViewRenderer({}, {
      viewsDirectory,
      output: discard,
      host: new ScriptHost({ cache: args.cache }),
      logger: silentLogger,
    });

    const results: BenchmarkResult[] = [];
    scenarios.forEach((scenario, i) => {
      const name = `scenario-${i}`;
      const markup = view.render(name, scenario.data, true) ?? '';

      if (args.mode === 'all' || args.mode === 'render') {
        results.push(measure('render', scenario.name, args.iterations, args.warmup,
          () => (view.render(name, scenario.data, true) ?? '').length));
      }
      if (args.mode === 'all' || args.mode === 'emit') {
        results.push(measure('emit', scenario.name, args.iterations, args.warmup, () => {
          view.render(name, scenario.data);
          return 1;
        }));
      }
      if (args.mode === 'all' || args.mode === 'sanitize') {
        results.push(measure('sanitize', scenario.name, args.iterations, args.warmup,
          () => sanitizeOutput(markup).length));
      }
    });

    report(args, results);
  } finally {
    fs.rmSync(viewsDirectory, { recursive: true, force: true });
  }
}

function report (args: ReturnType<typeof parseArgs>, results: BenchmarkResult[]): void {
  const rows = results.map((r) => ({
    kind: r.kind,
    scenario: r.scenario,
    iterations: r.iterations,
    totalMs: Number(r.totalMs.toFixed(2)),
    msPerOp: Number(r.msPerOp.toFixed(6)),
    opsPerSec: Number(r.opsPerSec.toFixed(0)),
  }));

  if (args.format === 'json') {
    console.log(JSON.stringify({
      node: process.version,
      params: {
        iterations: args.iterations,
        warmup: args.warmup,
        cache: args.cache,
        mode: args.mode,
      },
      results: rows,
    }));
    return;
  }

  if (args.format === 'md') {
    console.log('## viewkit benchmark');
    console.log('');
    console.log(`- Node: ${process.version}`);
    console.log(`- Params: iterations=${args.iterations}, warmup=${args.warmup}, cache=${args.cache}, mode=${args.mode}`);
    console.log('');
    console.log('| Kind | Scenario | Iterations | Total (ms) | ms/op | ops/sec |');
    console.log('| --- | --- | ---: | ---: | ---: | ---: |');
    for (const r of rows) {
      console.log(`| ${r.kind} | ${r.scenario} | ${r.iterations} | ${r.totalMs} | ${r.msPerOp} | ${r.opsPerSec} |`);
    }
    return;
  }

  console.log('View benchmark');
  console.log(`Node: ${process.version}`);
  console.log(`iterations=${args.iterations} warmup=${args.warmup} cache=${args.cache} mode=${args.mode}`);
  console.log('');
  console.table(rows);
}

main();
