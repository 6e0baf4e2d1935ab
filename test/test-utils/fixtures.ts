import { fileURLToPath } from 'node:url';

import type { OutputSink } from '../../src/types.js';

/**
 * Templates used by the renderer tests.
 */
export const viewsDir = fileURLToPath(new URL('../fixtures/views', import.meta.url));

/**
 * Component scripts used by the registry tests.
 */
export const componentsDir = fileURLToPath(new URL('../fixtures/components', import.meta.url));

/**
 * Output sink that records every chunk written to it.
 */
export interface CollectingSink extends OutputSink {
  chunks: string[];
  text: () => string;
}

export function collectingSink (): CollectingSink {
  const chunks: string[] = [];
  return {
    chunks,
    write: (chunk: string) => {
      chunks.push(chunk);
    },
    text: () => chunks.join(''),
  };
}
