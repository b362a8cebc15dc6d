/**
 * textar CLI
 *
 * Packs files into a plain-text archive, lists and extracts it, applies the
 * edit programs it carries and checks its command references.
 */

import {
  ArchiveDecodeError,
  ArchiveEncodeError,
  ArchiveError,
  EditApplyError,
  EditParseError,
  TagParseError,
} from '@textar/archive';
import { createCommand } from './commands/create';
import { extractCommand } from './commands/extract';
import { listCommand } from './commands/list';
import { applyCommand } from './commands/apply';
import { checkCommand } from './commands/check';
import { getFlag } from './flags';
import packageJson from '../package.json';

const CLI_VERSION = packageJson.version;

const HELP = `
textar - plain-text multi-file archives

Usage:
  textar create <paths...> [-o <file>] [--verbose]
                                   Pack files and directories into an archive (alias: c)
  textar extract [-i <file>] [-C <dir>] [--include-snippets] [--verbose]
                                   Write archived files to disk (alias: x)
  textar list [-i <file>] [--verbose]
                                   List archived files (alias: t)
  textar apply [-i <file>] [-C <dir>] [--dry-run]
                                   Apply the archive's edit programs to their targets
  textar check [-i <file>]         Verify snippet references against the archive's commands
  textar --help                    Show this help
  textar --version                 Show version

Options:
  --config <path>    Path to .textar/ directory (default: .textar/)
  --format <type>    Output format: text, json (default: text)
  --ci               CI mode: exit non-zero when check finds unresolved references
  -i <file>          Read the archive from a file instead of stdin
  -o <file>          Write the archive to a file instead of stdout
  -C <dir>           Directory to extract into or apply edits under (default: .)
`;

export const EXIT_CODE = {
  SUCCESS: 0,
  POLICY_VIOLATION: 1,
  RUNTIME_ERROR: 2,
} as const;

export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = EXIT_CODE.RUNTIME_ERROR
  ) {
    super(message);
    this.name = 'CLIError';
  }
}

export interface CLIOptions {
  configPath: string;
  format: 'text' | 'json';
  ciMode: boolean;
}

const COMMAND_ALIASES: Record<string, string> = {
  c: 'create',
  x: 'extract',
  t: 'list',
};

function isArchiveFailure(err: unknown): err is Error {
  return (
    err instanceof ArchiveError ||
    err instanceof ArchiveDecodeError ||
    err instanceof ArchiveEncodeError ||
    err instanceof TagParseError ||
    err instanceof EditParseError ||
    err instanceof EditApplyError
  );
}

function reportArchiveFailure(options: CLIOptions, err: Error): number {
  if (options.format === 'json') {
    console.log(JSON.stringify({ error: err.message, kind: err.name }, null, 2));
  } else {
    console.log(`  [error] ${err.message}`);
  }
  return EXIT_CODE.RUNTIME_ERROR;
}

export async function run(args: string[]): Promise<number> {
  const configPath = getFlag(args, '--config') || '.textar';
  const rawFormat = getFlag(args, '--format') || 'text';
  const ciMode = args.includes('--ci');

  if (args.includes('--help') || args.includes('-h')) {
    console.log(HELP);
    return EXIT_CODE.SUCCESS;
  }

  if (args.includes('--version') || args.includes('-v')) {
    console.log(`textar v${CLI_VERSION}`);
    return EXIT_CODE.SUCCESS;
  }

  if (rawFormat !== 'text' && rawFormat !== 'json') {
    throw new CLIError(`Invalid --format value: ${rawFormat}. Use text or json.`);
  }

  const options: CLIOptions = {
    configPath,
    format: rawFormat,
    ciMode,
  };

  if (args.length === 0 || args[0].startsWith('-')) {
    console.log(HELP);
    return EXIT_CODE.SUCCESS;
  }

  const command = COMMAND_ALIASES[args[0]] ?? args[0];
  const restArgs = args.slice(1);

  try {
    switch (command) {
      case 'create':
        return createCommand(options, restArgs);
      case 'extract':
        return extractCommand(options, restArgs);
      case 'list':
        return listCommand(options, restArgs);
      case 'apply':
        return applyCommand(options, restArgs);
      case 'check':
        return checkCommand(options, restArgs);
      default:
        throw new CLIError(`Unknown command: ${args[0]}\n${HELP}`);
    }
  } catch (err: unknown) {
    if (isArchiveFailure(err)) {
      return reportArchiveFailure(options, err);
    }
    throw err;
  }
}
