/**
 * MCP server for stack-notes.
 *
 * This module:
 * - Registers 4 tools (stack_parent, stack_list, stack_note, stack_update_notes)
 * - Builds a fresh stack context per tool call (no state across calls)
 * - Implements error handling at tool boundary
 *
 * @module mcp/server
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { handleNote } from '@/handlers/note';
import { handleParent } from '@/handlers/parent';
import { handleStack } from '@/handlers/stack';
import { handleUpdateNotes } from '@/handlers/update-notes';
import type { RepoContext } from '@/types';
import { formatMCPError, formatMCPResponse } from '@/utils/mcp-response';
import type { StackContext } from '@/utils/stacking';

export const SERVER_NAME = 'stack-notes';
export const SERVER_VERSION = '0.1.0';

/**
 * Builds the stack context for one tool call.
 */
export type StackContextFactory = (repo: RepoContext) => StackContext;

export interface McpServerOptions {
  /** Repository used when a call gives no cwd */
  defaultCwd: string;
  createContext: StackContextFactory;
}

const branchProperty = {
  description: 'Branch name (defaults to the checked-out branch)',
  type: 'string',
};

const cwdProperty = {
  description: 'Repository directory (defaults to the server working directory)',
  type: 'string',
};

const formatProperty = {
  description: 'Note format: double, list or table (defaults to STACK_NOTES_FORMAT or double)',
  enum: ['double', 'list', 'table'],
  type: 'string',
};

const TOOLS = [
  {
    description: 'Resolve the parent branch of a stacked branch from decorated git history.',
    inputSchema: {
      properties: { branch: branchProperty, cwd: cwdProperty },
      required: [],
      type: 'object' as const,
    },
    name: 'stack_parent',
  },
  {
    description:
      'List the stack of branches from a branch down to trunk (head first), optionally with PR numbers.',
    inputSchema: {
      properties: {
        branch: branchProperty,
        cwd: cwdProperty,
        prs: { description: 'Include PR numbers', type: 'boolean' },
      },
      required: [],
      type: 'object' as const,
    },
    name: 'stack_list',
  },
  {
    description: 'Render the stack note (previous/next PR links) for a branch in the current stack.',
    inputSchema: {
      properties: { branch: branchProperty, cwd: cwdProperty, format: formatProperty },
      required: [],
      type: 'object' as const,
    },
    name: 'stack_note',
  },
  {
    description:
      'Write the stack note into the PR description of every branch in the stack. Continues past per-branch failures.',
    inputSchema: {
      properties: {
        branch: branchProperty,
        cwd: cwdProperty,
        dry_run: { description: 'Compute new bodies without writing them', type: 'boolean' },
        format: formatProperty,
      },
      required: [],
      type: 'object' as const,
    },
    name: 'stack_update_notes',
  },
];

function resolveCwd(value: unknown, fallback: string): string {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error('cwd must be a non-empty string');
  }
  return value;
}

/**
 * Creates the MCP server with all tools registered.
 */
export function createMcpServer(options: McpServerOptions): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name } = request.params;
    const args = request.params.arguments ?? {};

    try {
      const ctx = options.createContext({ cwd: resolveCwd(args.cwd, options.defaultCwd) });

      switch (name) {
        case 'stack_parent':
          return formatMCPResponse(await handleParent({ branch: args.branch }, ctx));
        case 'stack_list':
          return formatMCPResponse(await handleStack({ branch: args.branch, prs: args.prs }, ctx));
        case 'stack_note':
          return formatMCPResponse(
            await handleNote({ branch: args.branch, format: args.format }, ctx)
          );
        case 'stack_update_notes':
          return formatMCPResponse(
            await handleUpdateNotes(
              { branch: args.branch, dry_run: args.dry_run, format: args.format },
              ctx
            )
          );
        default:
          throw new Error(`Unknown tool: ${name}`);
      }
    } catch (error) {
      // Error handling at layer boundary (MCP format)
      return formatMCPError(error instanceof Error ? error : new Error(String(error)));
    }
  });

  return server;
}

/**
 * Serves the tools over stdio until the client disconnects.
 */
export async function runMcpServer(options: McpServerOptions): Promise<void> {
  const server = createMcpServer(options);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
