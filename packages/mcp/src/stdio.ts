import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

/**
 * Creates a stdio transport for serving over the process's stdin/stdout
 * using JSON-RPC. Nothing else may write to stdout while it is connected.
 */
export function createStdioTransport(): Transport {
  return new StdioServerTransport();
}

/** Connects the server to stdio. Resolves once the transport is listening. */
export async function serveStdio(server: Server): Promise<Transport> {
  const transport = createStdioTransport();
  await server.connect(transport);
  return transport;
}
