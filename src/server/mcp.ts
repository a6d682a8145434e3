// pattern: Imperative Shell

/**
 * MCP protocol surface over the tool registry and dispatcher.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { Dispatcher, ToolRegistry } from '../tool/index.ts';

export type McpServerOptions = {
  readonly registry: ToolRegistry;
  readonly dispatcher: Dispatcher;
  readonly name: string;
  readonly version: string;
};

export function createMcpServer(options: McpServerOptions): Server {
  const { registry, dispatcher } = options;

  const server = new Server(
    { name: options.name, version: options.version },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.toModelTools(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;
    const result = await dispatcher.invoke(name, args ?? {}, extra.signal);

    return {
      content: result.content.map((item) => ({ type: 'text' as const, text: item.text })),
      isError: result.isError,
    };
  });

  return server;
}
