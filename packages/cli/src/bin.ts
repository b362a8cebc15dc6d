#!/usr/bin/env node

/**
 * textar CLI entrypoint
 */

import { CLIError, EXIT_CODE, run } from './index';

function fail(err: unknown): number {
  const msg = err instanceof Error ? err.message : String(err);
  console.error(`textar: ${msg}`);
  return err instanceof CLIError ? err.exitCode : EXIT_CODE.RUNTIME_ERROR;
}

run(process.argv.slice(2)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (err: unknown) => {
    process.exitCode = fail(err);
  }
);
