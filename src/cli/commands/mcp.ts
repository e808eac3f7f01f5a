import { Command } from 'commander';
import { type CliRuntime, repoFor } from '@/cli/runtime';
import { runMcpServer } from '@/mcp/server';

export function mcpCommand(runtime: CliRuntime): Command {
  return new Command('mcp')
    .description('Start the MCP server on stdio')
    .action(async (_options: unknown, command: Command) => {
      await runMcpServer({
        createContext: (repo) => runtime.createContext(repo),
        defaultCwd: repoFor(command, runtime).cwd,
      });
    });
}
