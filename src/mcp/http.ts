import { createServer, type IncomingMessage, type ServerResponse } from 'http';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { nanoid } from 'nanoid';
import { silentLogger, type Logger } from '../logger.js';
import type { MemoryOperations } from '../memory/operations.js';
import { createMcpServer, type RunningServer } from './server.js';

// "/mc" and "/" are aliases of "/mcp"
export const MCP_PATHS: ReadonlySet<string> = new Set(['/mcp', '/mc', '/']);

const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
  'Access-Control-Allow-Headers':
    'Content-Type, Accept, Authorization, Mcp-Session-Id, Mcp-Protocol-Version, Last-Event-ID',
  'Access-Control-Expose-Headers': 'Mcp-Session-Id',
};

export interface HttpServerOptions {
  operations: MemoryOperations;
  logger?: Logger;
  host?: string;
  port?: number;
}

export interface RunningHttpServer extends RunningServer {
  url: string;
  sessionCount(): number;
}

/**
 * Streamable HTTP transport. Each MCP session gets its own protocol server;
 * all of them share the caller's operations (and store).
 */
export async function startHttpServer(options: HttpServerOptions): Promise<RunningHttpServer> {
  const { operations, logger = silentLogger, host = '127.0.0.1', port = 8181 } = options;
  const sessions = new Map<string, StreamableHTTPServerTransport>();

  async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    for (const [name, value] of Object.entries(CORS_HEADERS)) {
      res.setHeader(name, value);
    }

    const { pathname } = new URL(req.url ?? '/', 'http://localhost');
    logger.debug(`${req.method ?? 'GET'} ${pathname}`);

    if (req.method === 'OPTIONS') {
      res.writeHead(204).end();
      return;
    }

    if (pathname === '/health' && req.method === 'GET') {
      sendJson(res, 200, { status: 'ok', sessions: sessions.size });
      return;
    }

    if (!MCP_PATHS.has(pathname)) {
      sendJson(res, 404, { error: `Not found: ${pathname}` });
      return;
    }

    const sessionId = req.headers['mcp-session-id'];
    const existing = typeof sessionId === 'string' ? sessions.get(sessionId) : undefined;
    if (existing) {
      await existing.handleRequest(req, res);
      return;
    }

    // Only an initialize POST may open a session; the transport rejects
    // anything else itself
    if (req.method !== 'POST') {
      sendJson(res, 400, rpcError(-32000, 'Bad Request: no valid session ID provided'));
      return;
    }

    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => nanoid(),
      onsessioninitialized: (id) => {
        sessions.set(id, transport);
        logger.debug(`Session ${id} opened`);
      },
    });
    transport.onclose = () => {
      if (transport.sessionId && sessions.delete(transport.sessionId)) {
        logger.debug(`Session ${transport.sessionId} closed`);
      }
    };

    const server = createMcpServer(operations, logger);
    await server.connect(transport);
    await transport.handleRequest(req, res);
  }

  const httpServer = createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      logger.error(`HTTP request failed: ${err instanceof Error ? err.message : String(err)}`);
      if (res.headersSent) {
        res.end();
      } else {
        sendJson(res, 500, rpcError(-32603, 'Internal server error'));
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(port, host, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  const address = httpServer.address();
  const boundPort = typeof address === 'object' && address !== null ? address.port : port;
  const url = `http://${host}:${boundPort}`;
  logger.debug(`Listening on ${url}`);

  return {
    url,
    sessionCount: () => sessions.size,
    close: async () => {
      const open = [...sessions.values()];
      sessions.clear();
      await Promise.all(open.map((transport) => transport.close()));
      httpServer.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' }).end(JSON.stringify(body));
}

function rpcError(code: number, message: string) {
  return { jsonrpc: '2.0', error: { code, message }, id: null };
}
