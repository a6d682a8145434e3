// pattern: Imperative Shell (barrel export)

export { createMcpServer } from './mcp.ts';
export type { McpServerOptions } from './mcp.ts';
export { serveStdio, serveSse, sseRoutes } from './serve.ts';
export type { RunningServer, RunningSseServer, SseRoutes, SseServerOptions } from './serve.ts';
