/**
 * textar list
 *
 * Prints archived file names, or one detail row per file with --verbose.
 */

import { formatTags } from '@textar/archive';
import type { CLIOptions } from '../index';
import { EXIT_CODE } from '../index';
import { loadConfig } from '../config';
import { decodeInput } from '../archive-input';
import { getFlag } from '../flags';

export function listCommand(options: CLIOptions, args: string[]): number {
  const config = loadConfig(options.configPath);
  const archive = decodeInput(args, config, getFlag(args, '-C') || '.');
  const verbose = args.includes('--verbose');

  if (options.format === 'json') {
    console.log(JSON.stringify({
      comment: archive.comment,
      commands: archive.commands,
      files: archive.files.map(f => ({
        name: f.name,
        encoding: f.isBinary ? 'binary' : 'text',
        size: f.data.length,
        tags: formatTags(f),
      })),
    }, null, 2));
    return EXIT_CODE.SUCCESS;
  }

  for (const file of archive.files) {
    if (!verbose) {
      console.log(file.name);
      continue;
    }
    const tags = formatTags(file);
    const row = `${file.name}  ${file.isBinary ? 'binary' : 'text'}  ${file.data.length}`;
    console.log(tags ? `${row}  ${tags}` : row);
  }

  return EXIT_CODE.SUCCESS;
}
