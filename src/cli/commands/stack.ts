import { Command } from 'commander';
import { type CliRuntime, repoFor, reportFailure } from '@/cli/runtime';
import { handleStack } from '@/handlers/stack';

interface StackOptions {
  prs?: boolean;
}

export function stackCommand(runtime: CliRuntime): Command {
  return new Command('stack')
    .description('Print the stack that ends in a branch, head first')
    .argument('[branch]', 'Head of the stack (defaults to the current branch)')
    .option('-p, --prs', 'Print PR numbers instead of branch names')
    .action(async (branch: string | undefined, options: StackOptions, command: Command) => {
      try {
        const ctx = runtime.createContext(repoFor(command, runtime));
        const result = await handleStack({ branch, prs: options.prs === true }, ctx);

        if (result.prs) {
          for (const { pr } of result.prs) {
            runtime.print(`- #${pr}`);
          }
          return;
        }

        for (const name of result.branches) {
          runtime.print(name);
        }
      } catch (error) {
        reportFailure(runtime, error);
      }
    });
}
