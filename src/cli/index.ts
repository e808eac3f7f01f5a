import { Command } from 'commander';
import { mcpCommand } from '@/cli/commands/mcp';
import { noteCommand } from '@/cli/commands/note';
import { parentCommand } from '@/cli/commands/parent';
import { stackCommand } from '@/cli/commands/stack';
import { updateNotesCommand } from '@/cli/commands/update-notes';
import type { CliRuntime } from '@/cli/runtime';
import { SERVER_VERSION } from '@/mcp/server';

export function createProgram(runtime: CliRuntime): Command {
  const program = new Command();

  program
    .name('stack-notes')
    .description('Navigate stacked branches and link their PRs to each other')
    .version(SERVER_VERSION)
    .option('-C, --cwd <dir>', 'Run as if started in <dir>');

  program.addCommand(parentCommand(runtime));
  program.addCommand(stackCommand(runtime));
  program.addCommand(noteCommand(runtime));
  program.addCommand(updateNotesCommand(runtime));
  program.addCommand(mcpCommand(runtime));

  return program;
}
