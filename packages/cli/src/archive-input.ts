/**
 * Decoding archive input for the read-side commands.
 */

import type { Archive } from '@textar/archive';
import { createNodeFileProbe, decodeArchive } from '@textar/archive';
import type { TextarConfig } from './config';
import { readInput } from './flags';

/**
 * Decode the archive named by `-i` (or stdin). Edit targets outside the
 * archive are looked up under `rootDir`; decode warnings print only with
 * `--verbose`.
 */
export function decodeInput(args: string[], config: TextarConfig, rootDir: string): Archive {
  const verbose = args.includes('--verbose');
  return decodeArchive(readInput(args), {
    strictTags: config.decode.strictTags,
    fileProbe: createNodeFileProbe(rootDir),
    onWarning: verbose
      ? (warning) => console.warn(`  [warn] line ${warning.line}: ${warning.message}`)
      : undefined,
  });
}
