import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import type { IO } from './types';

/**
 * Node IO adapter (fs + path) for reading `@file` sources.
 */
export function createNodeIO(): IO {
  return {
    cwd: () => process.cwd(),
    path: {
      resolve: (...parts) => path.resolve(...parts)
    },
    readText: async (p) => await readFile(p, 'utf8')
  };
}
