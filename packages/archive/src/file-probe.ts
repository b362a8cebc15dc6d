/**
 * FileProbe implementations for edit-target validation.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { FileProbe } from './types';

/** Knows no files: edit targets must be carried by the archive. */
export const EMPTY_FILE_PROBE: FileProbe = {
  exists: () => false,
};

/**
 * Resolve names against `rootDir` on the local disk.
 */
export function createNodeFileProbe(rootDir: string = process.cwd()): FileProbe {
  return {
    exists: (name: string) => fs.existsSync(path.resolve(rootDir, name)),
  };
}

/**
 * Probe backed by a fixed set of names.
 */
export function createSetFileProbe(names: Iterable<string>): FileProbe {
  const known = new Set(names);
  return {
    exists: (name: string) => known.has(name),
  };
}
