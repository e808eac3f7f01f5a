/**
 * MCP response formatting utilities.
 *
 * This module provides helpers to format tool responses according to the MCP protocol.
 * All MCP tool responses must have a `content` array containing content items.
 *
 * @module utils/mcp-response
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

/**
 * MCP tool response format (re-export of CallToolResult).
 */
export type MCPToolResponse = CallToolResult;

/**
 * Formats a success response in MCP protocol format.
 *
 * Converts handler output to an MCP response with JSON-stringified text content.
 *
 * @example
 * ```typescript
 * return formatMCPResponse({ branch: 'feature-b', parent: 'feature-a' });
 * // {
 * //   content: [{ type: 'text', text: '{\n  "branch": "feature-b",\n  "parent": "feature-a"\n}' }]
 * // }
 * ```
 */
export function formatMCPResponse(data: unknown): MCPToolResponse {
  return {
    content: [
      {
        text: JSON.stringify(data, null, 2),
        type: 'text',
      },
    ],
  };
}

/**
 * Formats an error response in MCP protocol format, with the isError flag set.
 *
 * @example
 * ```typescript
 * return formatMCPError(new TrunkNotFoundError());
 * // {
 * //   content: [{ type: 'text', text: '{\n  "error": "Trunk branch not found. ...",\n  "type": "TrunkNotFoundError"\n}' }],
 * //   isError: true
 * // }
 * ```
 */
export function formatMCPError(error: string | Error): MCPToolResponse {
  const body =
    error instanceof Error ? { error: error.message, type: error.name } : { error, type: 'Error' };
  return {
    content: [
      {
        text: JSON.stringify(body, null, 2),
        type: 'text',
      },
    ],
    isError: true,
  };
}
