import type { ToolContext, ToolRegistry, ToolResult } from '@newsdesk/tools';

/**
 * The subset of JSON Schema emitted for tool parameters.
 */
export interface JsonSchema {
  type?: 'object' | 'string' | 'number' | 'integer' | 'boolean' | 'array';
  properties?: Record<string, JsonSchema>;
  required?: string[];
  items?: JsonSchema;
  enum?: string[];
  description?: string;
  default?: unknown;
  minimum?: number;
  maximum?: number;
  minLength?: number;
  maxLength?: number;
  pattern?: string;
}

/**
 * MCP tool description as listed to clients.
 */
export interface MCPTool {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, JsonSchema>;
    required?: string[];
  };
}

/**
 * Result of a tools/call request.
 */
export interface MCPToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
}

export interface NewsdeskServerOptions {
  /** Server name reported to clients during initialization */
  name?: string;
  version?: string;
  registry: ToolRegistry;
  context: ToolContext;
  /** Called for every failed tool call, before the failure is returned to the client */
  onError?: (toolName: string, result: ToolResult) => void;
}

export interface HttpServerOptions {
  host: string;
  port: number;
  /** Extra fields reported by `GET /health` */
  health?: () => Record<string, unknown>;
  /** Called for transport-level failures */
  onError?: (error: Error) => void;
}

export interface HttpServerHandle {
  /** Base URL the server listens on, e.g. http://127.0.0.1:3030 */
  url: string;
  close(): Promise<void>;
}
