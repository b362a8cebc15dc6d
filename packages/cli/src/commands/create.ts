/**
 * textar create <paths...>
 *
 * Packs files and directories into an archive. Directory entries are named
 * relative to the directory given, with `/` separators, in sorted order.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { Archive, createFile, encodeArchive } from '@textar/archive';
import type { CLIOptions } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { loadConfig } from '../config';
import { getFlag, getPositionals } from '../flags';

interface SourceEntry {
  name: string;
  fullPath: string;
}

export function createCommand(options: CLIOptions, args: string[]): number {
  const inputs = getPositionals(args);
  if (inputs.length === 0) {
    throw new CLIError('Usage: textar create <paths...> [-o <file>]\nExample: textar create src README.md -o bundle.txt');
  }

  const config = loadConfig(options.configPath);
  const verbose = args.includes('--verbose');
  const outputPath = getFlag(args, '-o');
  const exclude = new Set(config.create.exclude);

  const archive = new Archive();
  for (const input of inputs) {
    for (const entry of collectEntries(input, exclude)) {
      const file = createFile(entry.name, fs.readFileSync(entry.fullPath), config.encoding);
      archive.addFile(file);
      if (verbose && file.isBinary) {
        console.warn(`  [warn] ${file.name} stored as base64 (${file.binaryReason})`);
      }
    }
  }

  const text = encodeArchive(archive);

  if (!outputPath) {
    process.stdout.write(text);
    return EXIT_CODE.SUCCESS;
  }

  fs.writeFileSync(outputPath, text);

  if (options.format === 'json') {
    console.log(JSON.stringify({
      output: outputPath,
      files: archive.files.map(f => ({ name: f.name, isBinary: f.isBinary, size: f.data.length })),
    }, null, 2));
    return EXIT_CODE.SUCCESS;
  }

  console.log(`  [ok] Wrote ${archive.files.length} file(s) to ${outputPath}`);
  return EXIT_CODE.SUCCESS;
}

function collectEntries(input: string, exclude: Set<string>): SourceEntry[] {
  if (!fs.existsSync(input)) {
    throw new CLIError(`Path not found: ${input}`);
  }

  if (!fs.statSync(input).isDirectory()) {
    return [{ name: path.basename(input), fullPath: input }];
  }

  const entries: SourceEntry[] = [];
  walk(input, '', exclude, entries);
  return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

function walk(dir: string, prefix: string, exclude: Set<string>, out: SourceEntry[]): void {
  for (const dirent of fs.readdirSync(dir, { withFileTypes: true })) {
    const name = prefix ? `${prefix}/${dirent.name}` : dirent.name;
    if (exclude.has(dirent.name) || exclude.has(name)) continue;

    const fullPath = path.join(dir, dirent.name);
    if (dirent.isDirectory()) {
      walk(fullPath, name, exclude, out);
    } else if (dirent.isFile()) {
      out.push({ name, fullPath });
    }
  }
}
