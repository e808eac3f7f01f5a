import { Command } from 'commander';
import { type CliRuntime, repoFor, reportFailure } from '@/cli/runtime';
import { handleNote } from '@/handlers/note';

interface NoteOptions {
  format?: string;
}

export function noteCommand(runtime: CliRuntime): Command {
  return new Command('note')
    .description('Print the [!Note] block for the PR of a branch in the current stack')
    .argument('[branch]', 'Branch to describe (defaults to the current branch)')
    .option('-f, --format <format>', 'Note format: double, list or table')
    .action(async (branch: string | undefined, options: NoteOptions, command: Command) => {
      try {
        const ctx = runtime.createContext(repoFor(command, runtime));
        const { note } = await handleNote({ branch, format: options.format }, ctx);
        runtime.print(note);
      } catch (error) {
        reportFailure(runtime, error);
      }
    });
}
