import { Command } from 'commander';
import { type CliRuntime, repoFor, reportFailure } from '@/cli/runtime';
import { handleUpdateNotes } from '@/handlers/update-notes';
import type { NoteSyncResult } from '@/types';

interface UpdateNotesOptions {
  format?: string;
  dryRun?: boolean;
}

/**
 * Formats one progress line, e.g. `feature-b: updated (#41)`.
 */
export function progressLine(result: NoteSyncResult): string {
  const pr = result.pr === undefined ? '' : ` (#${result.pr})`;
  const error = result.error === undefined ? '' : `: ${result.error}`;
  return `${result.branch}: ${result.status}${pr}${error}`;
}

export function updateNotesCommand(runtime: CliRuntime): Command {
  return new Command('update-notes')
    .description('Write the stack note into the PR description of every branch in the stack')
    .argument('[branch]', 'Head of the stack (defaults to the current branch)')
    .option('-f, --format <format>', 'Note format: double, list or table')
    .option('-n, --dry-run', 'Print the new descriptions instead of updating them')
    .action(async (branch: string | undefined, options: UpdateNotesOptions, command: Command) => {
      try {
        const ctx = runtime.createContext(repoFor(command, runtime));
        const { results } = await handleUpdateNotes(
          { branch, dry_run: options.dryRun === true, format: options.format },
          ctx
        );

        for (const result of results) {
          runtime.print(progressLine(result));
          if (result.body !== undefined) {
            runtime.print(result.body);
          }
        }

        if (results.some((result) => result.status === 'failed')) {
          process.exitCode = 1;
        }
      } catch (error) {
        reportFailure(runtime, error);
      }
    });
}
