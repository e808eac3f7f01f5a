/**
 * CLI runtime: how commands build their stack context and where they print.
 *
 * @module cli/runtime
 */

import type { Command } from 'commander';
import { errorMessage } from '@/errors';
import type { RepoContext } from '@/types';
import type { StackContext } from '@/utils/stacking';

export interface CliRuntime {
  createContext(repo: RepoContext): StackContext;
  /** Command output (stdout) */
  print(text: string): void;
  /** Diagnostics (stderr) */
  printError(text: string): void;
  /** Repository used when no --cwd is given */
  defaultCwd: string;
}

interface GlobalOptions {
  cwd?: string;
}

/**
 * Resolves the repository selected by the global `--cwd` option.
 */
export function repoFor(command: Command, runtime: CliRuntime): RepoContext {
  const { cwd } = command.optsWithGlobals<GlobalOptions>();
  return { cwd: cwd ?? runtime.defaultCwd };
}

/**
 * Reports an unrecovered error and marks the process as failed.
 */
export function reportFailure(runtime: CliRuntime, error: unknown): void {
  runtime.printError(`Error: ${errorMessage(error)}`);
  process.exitCode = 1;
}
