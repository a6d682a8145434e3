// pattern: Imperative Shell

/**
 * Transports: stdio for a spawned child process, or an HTTP listener speaking MCP over SSE.
 */

import { createServer } from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createMcpServer } from './mcp.ts';
import type { McpServerOptions } from './mcp.ts';

export type RunningServer = {
  close(): Promise<void>;
};

export type RunningSseServer = RunningServer & {
  address(): AddressInfo;
};

export type SseServerOptions = McpServerOptions & {
  readonly host: string;
  readonly port: number;
  readonly baseUrl: string;
};

const MESSAGE_PATH = '/message';
const SSE_PATH = '/sse';

export type SseRoutes = {
  readonly ssePath: string;
  readonly messagePath: string;
};

/**
 * The path of `baseUrl` prefixes both routes, so a deployment behind `https://host/triage`
 * serves `/triage/sse` and tells clients to post to `/triage/message`.
 */
export function sseRoutes(baseUrl: string): SseRoutes {
  const prefix = new URL(baseUrl).pathname.replace(/\/+$/, '');
  return {
    ssePath: `${prefix}${SSE_PATH}`,
    messagePath: `${prefix}${MESSAGE_PATH}`,
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function serveStdio(options: McpServerOptions): Promise<RunningServer> {
  const server = createMcpServer(options);
  await server.connect(new StdioServerTransport());
  console.error(`[server] ${options.name} ${options.version} serving on stdio`);

  return {
    close: () => server.close(),
  };
}

/**
 * One MCP server per SSE connection; client messages are routed back to it by session id.
 */
export async function serveSse(options: SseServerOptions): Promise<RunningSseServer> {
  const sessions = new Map<string, SSEServerTransport>();
  const { ssePath, messagePath } = sseRoutes(options.baseUrl);

  async function openSession(res: ServerResponse): Promise<void> {
    const transport = new SSEServerTransport(messagePath, res);
    const server = createMcpServer(options);
    sessions.set(transport.sessionId, transport);

    res.on('close', () => {
      sessions.delete(transport.sessionId);
      server.close().catch((error: unknown) => {
        console.error(`[server] failed to close session ${transport.sessionId}: ${errorMessage(error)}`);
      });
    });

    await server.connect(transport);
  }

  async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', options.baseUrl);

    if (req.method === 'GET' && url.pathname === ssePath) {
      await openSession(res);
      return;
    }

    if (req.method === 'POST' && url.pathname === messagePath) {
      const sessionId = url.searchParams.get('sessionId');
      const transport = sessionId === null ? undefined : sessions.get(sessionId);
      if (!transport) {
        res.writeHead(404, { 'Content-Type': 'text/plain' }).end('unknown session');
        return;
      }
      await transport.handlePostMessage(req, res);
      return;
    }

    res.writeHead(404, { 'Content-Type': 'text/plain' }).end('not found');
  }

  const httpServer = createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      console.error(`[server] request failed: ${errorMessage(error)}`);
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'text/plain' });
      }
      res.end();
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });
  console.error(
    `[server] ${options.name} ${options.version} serving SSE at ${new URL(ssePath, options.baseUrl).href}`,
  );

  return {
    address(): AddressInfo {
      const address = httpServer.address();
      if (address === null || typeof address === 'string') {
        throw new Error('SSE listener has no TCP address');
      }
      return address;
    },
    async close(): Promise<void> {
      await Promise.all(Array.from(sessions.values(), (transport) => transport.close()));
      sessions.clear();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
      });
    },
  };
}
