import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import type { HttpServerHandle, HttpServerOptions } from './types.js';

export type HttpRequestHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Request handler for the Streamable HTTP transport in stateless mode:
 * every `POST /mcp` gets a fresh server and transport, torn down when the
 * response closes. `GET /health` reports liveness.
 */
export function createHttpHandler(
  createMcpServer: () => Server,
  options: Pick<HttpServerOptions, 'health' | 'onError'> = {},
): HttpRequestHandler {
  const reportError = (err: unknown): void => {
    options.onError?.(toError(err));
  };

  return async (req, res) => {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;

    if (path === '/health') {
      if (req.method !== 'GET') {
        sendJson(res, 405, { error: 'Method not allowed' });
        return;
      }
      sendJson(res, 200, { status: 'ok', ...options.health?.() });
      return;
    }

    if (path !== '/mcp') {
      sendJson(res, 404, { error: `Not found: ${path}` });
      return;
    }

    if (req.method !== 'POST') {
      sendJson(res, 405, {
        jsonrpc: '2.0',
        error: { code: -32000, message: 'Method not allowed.' },
        id: null,
      });
      return;
    }

    const server = createMcpServer();
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    res.on('close', () => {
      transport.close().catch(reportError);
      server.close().catch(reportError);
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res);
    } catch (err) {
      reportError(err);
      if (!res.headersSent) {
        sendJson(res, 500, {
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null,
        });
      }
    }
  };
}

/**
 * Starts an HTTP server on `host:port`. Resolves once it is listening.
 */
export function startHttpServer(
  createMcpServer: () => Server,
  options: HttpServerOptions,
): Promise<HttpServerHandle> {
  const handler = createHttpHandler(createMcpServer, options);
  const httpServer = createServer((req, res) => {
    handler(req, res).catch((err: unknown) => {
      options.onError?.(toError(err));
    });
  });

  return new Promise((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off('error', reject);
      const address = httpServer.address();
      const port = typeof address === 'object' && address ? address.port : options.port;
      resolve({
        url: `http://${options.host}:${port}`,
        close: () => new Promise<void>((done, fail) => {
          httpServer.close(err => (err ? fail(err) : done()));
        }),
      });
    });
  });
}
