import { Command } from 'commander';
import { type CliRuntime, repoFor, reportFailure } from '@/cli/runtime';
import { handleParent } from '@/handlers/parent';

export function parentCommand(runtime: CliRuntime): Command {
  return new Command('parent')
    .description('Print the parent of a branch')
    .argument('[branch]', 'Branch to find the parent of (defaults to the current branch)')
    .action(async (branch: string | undefined, _options: unknown, command: Command) => {
      try {
        const ctx = runtime.createContext(repoFor(command, runtime));
        const { parent } = await handleParent({ branch }, ctx);
        if (parent !== null) {
          runtime.print(parent);
        }
      } catch (error) {
        reportFailure(runtime, error);
      }
    });
}
