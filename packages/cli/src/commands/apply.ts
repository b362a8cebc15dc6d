/**
 * textar apply
 *
 * Applies every edit program in the archive to its target. The archive's
 * own copy of a target wins over the file on disk under `-C`.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { decodeUtf8, EditApplyError, resolveEditTargets } from '@textar/archive';
import type { CLIOptions } from '../index';
import { EXIT_CODE } from '../index';
import { loadConfig } from '../config';
import { decodeInput } from '../archive-input';
import { getFlag } from '../flags';
import { resolveUnder } from './extract';

export function applyCommand(options: CLIOptions, args: string[]): number {
  const config = loadConfig(options.configPath);
  const rootDir = getFlag(args, '-C') || '.';
  const dryRun = args.includes('--dry-run');

  const archive = decodeInput(args, config, rootDir);

  const readTarget = (name: string): string | null => {
    const target = resolveUnder(rootDir, name);
    if (!fs.existsSync(target)) return null;
    const text = decodeUtf8(fs.readFileSync(target));
    if (text === null) {
      throw new EditApplyError('invalid-utf8', `Edit target '${name}' is not valid UTF-8`);
    }
    return text;
  };

  const results = resolveEditTargets(archive, readTarget, { matchPolicy: config.edits.matchPolicy });

  if (!dryRun) {
    for (const result of results) {
      const target = resolveUnder(rootDir, result.name);
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, result.content);
    }
  }

  if (options.format === 'json') {
    console.log(JSON.stringify({
      dryRun,
      directory: rootDir,
      results: results.map(r => ({ name: r.name, source: r.source, ...(dryRun ? { content: r.content } : {}) })),
    }, null, 2));
    return EXIT_CODE.SUCCESS;
  }

  if (results.length === 0) {
    console.log('  [ok] No edit files in archive.');
    return EXIT_CODE.SUCCESS;
  }

  const verb = dryRun ? 'Would update' : 'Updated';
  for (const result of results) {
    console.log(`  [ok] ${verb} ${result.name} (from ${result.source} copy)`);
  }
  return EXIT_CODE.SUCCESS;
}
