import { logger as baseLogger, type Logger } from './logger.js';

/**
 * One rewrite pass of the output sanitizer.
 */
export interface SanitizerPass {
  name: string;
  pattern: RegExp;
  replacement: string;
}

/**
 * Sanitizer passes in execution order. Later passes rely on earlier ones
 * having run.
 */
export const SANITIZER_PASSES: readonly SanitizerPass[] = Object.freeze([
  // conditional comments (<!--[if IE]>) and <!--<! openers are kept
  { name: 'comments', pattern: /<!--(?!\[if)(?!<!)[\s\S]*?-->/g, replacement: '' },
  { name: 'inter-tag-whitespace', pattern: />\s+</g, replacement: '><' },
  { name: 'trailing-whitespace', pattern: /[ \t]+$/gm, replacement: '' },
  { name: 'blank-lines', pattern: /\n{3,}/g, replacement: '\n\n' },
].map((pass) => Object.freeze(pass)));

const log = baseLogger.child({ module: 'sanitizer' });

/**
 * Strip HTML comments and redundant whitespace from rendered output.
 *
 * Never throws: `null`/`undefined`/empty input and any failure inside a pass
 * yield an empty string. Other values are stringified first.
 *
 * @param text - Fully rendered output.
 * @param logger - Where a failing pass is reported.
 * @returns Sanitized text.
 */
export function sanitizeOutput (text: unknown, logger: Logger = log): string {
  if (text === null || text === undefined || text === '') return '';

  let stage = 'stringify';
  try {
    let out = String(text);
    for (const pass of SANITIZER_PASSES) {
      stage = pass.name;
      out = out.replace(pass.pattern, pass.replacement);
    }
    return out;
  } catch (err) {
    logger.warn({ err, stage }, 'Output sanitization failed, emitting nothing');
    return '';
  }
}
