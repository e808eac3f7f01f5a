#!/usr/bin/env node

/**
 * CLI entry point for stack-notes.
 *
 * This module:
 * - Loads configuration from the environment
 * - Creates the stderr logger
 * - Wires the git/gh adapters into every command
 * - Reports startup errors (invalid configuration) at the process boundary
 *
 * @module index
 */

import { createProgram } from '@/cli';
import type { CliRuntime } from '@/cli/runtime';
import { errorMessage } from '@/errors';
import { loadConfig } from '@/utils/config';
import { createLogger } from '@/utils/logger';
import { createStackContext } from '@/utils/stacking';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });

  const runtime: CliRuntime = {
    createContext: (repo) => createStackContext(repo, config, logger),
    defaultCwd: process.cwd(),
    // biome-ignore lint/suspicious/noConsole: command output
    print: (text) => console.log(text),
    // biome-ignore lint/suspicious/noConsole: diagnostics
    printError: (text) => console.error(text),
  };

  await createProgram(runtime).parseAsync(process.argv);
}

main().catch((error: unknown) => {
  // biome-ignore lint/suspicious/noConsole: Entry point needs error logging
  console.error(`Error: ${errorMessage(error)}`);
  process.exitCode = 1;
});
