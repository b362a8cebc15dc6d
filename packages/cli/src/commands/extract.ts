/**
 * textar extract
 *
 * Writes normal files (and, on request, snippet files) under `-C`.
 * Edit files are left to `textar apply`.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ArchiveFile } from '@textar/archive';
import { isNormalFile } from '@textar/archive';
import type { CLIOptions } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { loadConfig } from '../config';
import { decodeInput } from '../archive-input';
import { getFlag } from '../flags';

interface ExtractResult {
  directory: string;
  written: string[];
  skipped: Array<{ name: string; reason: 'edit' | 'snippet' }>;
}

export function extractCommand(options: CLIOptions, args: string[]): number {
  const config = loadConfig(options.configPath);
  const outDir = getFlag(args, '-C') || '.';
  const includeSnippets = args.includes('--include-snippets');
  const verbose = args.includes('--verbose');

  const archive = decodeInput(args, config, outDir);
  const result: ExtractResult = { directory: outDir, written: [], skipped: [] };

  for (const file of archive.files) {
    if (file.editRef) {
      result.skipped.push({ name: file.name, reason: 'edit' });
      continue;
    }
    if (file.snippetRef && !includeSnippets) {
      result.skipped.push({ name: file.name, reason: 'snippet' });
      continue;
    }
    writeArchiveFile(outDir, file);
    result.written.push(file.name);
    if (verbose && options.format === 'text') {
      console.log(`  ${file.name}${isNormalFile(file) ? '' : ' (snippet)'}`);
    }
  }

  if (options.format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return EXIT_CODE.SUCCESS;
  }

  console.log(`  [ok] Extracted ${result.written.length} file(s) to ${outDir}`);
  const edits = result.skipped.filter(s => s.reason === 'edit').length;
  if (edits > 0) {
    console.log(`  [warn] Skipped ${edits} edit file(s); run textar apply to apply them.`);
  }
  return EXIT_CODE.SUCCESS;
}

/**
 * Resolve an archive name under `rootDir`, refusing names that escape it.
 */
export function resolveUnder(rootDir: string, name: string): string {
  const root = path.resolve(rootDir);
  const target = path.resolve(root, name);
  if (target !== root && !target.startsWith(root + path.sep)) {
    throw new CLIError(`Refusing to write outside ${rootDir}: ${name}`);
  }
  return target;
}

function writeArchiveFile(rootDir: string, file: ArchiveFile): void {
  const target = resolveUnder(rootDir, file.name);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, file.data);
}
