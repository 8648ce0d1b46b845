export {
  type JsonSchema,
  type MCPTool,
  type MCPToolResult,
  type NewsdeskServerOptions,
  type HttpServerOptions,
  type HttpServerHandle,
} from './types.js';

export {
  zodToJsonSchema,
  zodToJsonSchemaProperty,
  toMCPTool,
  toMCPToolResult,
} from './adapter.js';

export { createNewsdeskServer, DEFAULT_SERVER_NAME, SERVER_VERSION } from './server.js';
export { createStdioTransport, serveStdio } from './stdio.js';
export { createHttpHandler, startHttpServer, type HttpRequestHandler } from './http.js';
