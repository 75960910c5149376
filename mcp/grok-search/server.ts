/**
 * Grok Search MCP Server
 *
 * Exposes the search pipeline as the `grok_web_search` tool. Tool failures are
 * returned as `isError` results; the handler only rejects on cancellation.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  type CallToolResult,
  ListToolsRequestSchema,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { type FormatOptions, formatResultForLlm, helpText } from './format.js';
import type { SearchOptions, SearchResult } from './types.js';

// ============================================================================
// Configuration
// ============================================================================

export const SERVER_NAME = 'grok-search';
export const SERVER_VERSION = '1.0.0';
export const TOOL_NAME = 'grok_web_search';

/** Maximum query length accepted from a model */
export const MAX_QUERY_LENGTH = 4000;

export interface ServerDeps {
  search: (query: string, options?: SearchOptions) => Promise<SearchResult>;
  formatOptions: FormatOptions;
}

// ============================================================================
// Input Validation
// ============================================================================

export type ValidationResult =
  | { valid: true; sanitized: string }
  | { valid: false; error: string };

export function validateQuery(query: unknown): ValidationResult {
  if (typeof query !== 'string' || query.trim().length === 0) {
    return { valid: false, error: 'Query cannot be empty' };
  }

  if (query.length > MAX_QUERY_LENGTH) {
    return {
      valid: false,
      error: `Query too long: ${query.length} > ${MAX_QUERY_LENGTH}`,
    };
  }

  return { valid: true, sanitized: query.trim().replace(/\s+/g, ' ') };
}

// ============================================================================
// Tools
// ============================================================================

export const ALL_TOOLS: Tool[] = [
  {
    name: TOOL_NAME,
    description:
      'Search the live web through Grok. Returns a concise answer with its sources. Best for: current events, recent releases, facts beyond the training cutoff.',
    inputSchema: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description: 'The search query to execute',
        },
      },
      required: ['query'],
    },
  },
];

function errorResult(text: string): CallToolResult {
  return {
    content: [{ type: 'text', text }],
    isError: true,
  };
}

export async function handleToolCall(
  name: string,
  args: Record<string, unknown> | undefined,
  deps: ServerDeps,
  signal?: AbortSignal,
): Promise<CallToolResult> {
  if (name !== TOOL_NAME) {
    return errorResult(`Error: Unknown tool "${name}"`);
  }

  const validation = validateQuery(args?.query);
  if (!validation.valid) {
    return errorResult(`Error: ${validation.error}`);
  }

  const result = await deps.search(validation.sanitized, { signal });
  console.error(
    result.ok
      ? `[grok-search] ${TOOL_NAME} ok in ${result.elapsedMs}ms (${result.sources.length} sources, ${result.retries} retries)`
      : `[grok-search] ${TOOL_NAME} failed: ${result.error ?? 'unknown error'}`,
  );

  return {
    content: [
      {
        type: 'text',
        text: formatResultForLlm(result, deps.formatOptions) || 'No results returned',
      },
    ],
    isError: !result.ok,
  };
}

// ============================================================================
// MCP Server Setup
// ============================================================================

export function createServer(deps: ServerDeps): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    {
      capabilities: { tools: { listChanged: false } },
      instructions: helpText(),
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: ALL_TOOLS };
  });

  // extra.signal aborts when the client cancels the request or the transport closes
  server.setRequestHandler(CallToolRequestSchema, async (request, extra): Promise<CallToolResult> => {
    const { name, arguments: args } = request.params;
    return handleToolCall(name, args, deps, extra.signal);
  });

  return server;
}
