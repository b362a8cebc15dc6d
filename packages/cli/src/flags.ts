/**
 * Argument parsing and archive input for the commands.
 *
 * Value flags take their value from the next argument or after `=`
 * (`--config .cfg` or `--config=.cfg`).
 */

import * as fs from 'node:fs';
import { decodeUtf8 } from '@textar/archive';
import { CLIError } from './index';

const VALUE_FLAGS = new Set(['--config', '--format', '-o', '-i', '-C']);

export function getFlag(args: string[], flag: string): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === flag) {
      return i + 1 < args.length ? args[i + 1] : undefined;
    }
    if (arg.startsWith(`${flag}=`)) {
      return arg.slice(flag.length + 1);
    }
  }
  return undefined;
}

/**
 * Arguments that are neither flags nor flag values.
 */
export function getPositionals(args: string[]): string[] {
  const positionals: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg)) {
      i++;
    } else if (!arg.startsWith('-')) {
      positionals.push(arg);
    }
  }
  return positionals;
}

/**
 * Archive text from `-i <file>`, or stdin when the flag is absent.
 * Input that is not well-formed UTF-8 is rejected rather than repaired.
 */
export function readInput(args: string[]): string {
  const inputPath = getFlag(args, '-i');
  if (inputPath && !fs.existsSync(inputPath)) {
    throw new CLIError(`File not found for -i: ${inputPath}`);
  }

  const source = inputPath ?? 'stdin';
  const text = decodeUtf8(fs.readFileSync(inputPath ?? 0));
  if (text === null) {
    throw new CLIError(`Archive input from ${source} is not valid UTF-8`);
  }
  return text;
}
