import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { toFailure, type ToolResult } from '@newsdesk/tools';
import { toMCPTool, toMCPToolResult } from './adapter.js';
import type { MCPToolResult, NewsdeskServerOptions } from './types.js';

export const DEFAULT_SERVER_NAME = 'newsdesk';
export const SERVER_VERSION = '0.1.0';

/**
 * Builds an MCP server exposing every tool in the registry.
 *
 * The server holds no corpus state of its own: each call goes through the
 * shared tool context, so a snapshot swap in the store is visible to the
 * next call on every connected session.
 */
export function createNewsdeskServer(options: NewsdeskServerOptions): Server {
  const { registry, context, onError } = options;

  const server = new Server(
    { name: options.name ?? DEFAULT_SERVER_NAME, version: options.version ?? SERVER_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.list().map(toMCPTool),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<MCPToolResult> => {
    const { name, arguments: args } = request.params;
    let result: ToolResult;
    try {
      result = await registry.executeTool(name, args ?? {}, context);
    } catch (err) {
      result = toFailure(err);
    }
    if (!result.success) {
      onError?.(name, result);
    }
    return toMCPToolResult(result);
  });

  return server;
}
