/**
 * textar check
 *
 * Verifies that every snippet reference names a command declared in the
 * archive comment. Unresolved references are warnings; --ci makes them fail.
 */

import type { CLIOptions } from '../index';
import { EXIT_CODE } from '../index';
import { loadConfig } from '../config';
import { decodeInput } from '../archive-input';
import { getFlag } from '../flags';

export function checkCommand(options: CLIOptions, args: string[]): number {
  const config = loadConfig(options.configPath);
  const archive = decodeInput(args, config, getFlag(args, '-C') || '.');
  const issues = archive.validateSnippetRefs();
  const status = issues.length === 0 ? 'PASS' : 'WARN';
  const exitCode = issues.length > 0 && options.ciMode ? EXIT_CODE.POLICY_VIOLATION : EXIT_CODE.SUCCESS;

  if (options.format === 'json') {
    console.log(JSON.stringify({ status, commands: archive.commands, issues }, null, 2));
    return exitCode;
  }

  if (issues.length === 0) {
    console.log(`  [ok] All snippet references resolve (${archive.commands.length} command(s) declared).`);
    return exitCode;
  }

  for (const issue of issues) {
    console.log(`  [warn] ${issue.file} references missing command #${issue.missingCommand}`);
  }
  return exitCode;
}
