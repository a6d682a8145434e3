// pattern: Imperative Shell

/**
 * Process entry: parse flags, load config, register tool groups, serve MCP.
 */

import { pathToFileURL } from 'node:url';
import { Command, InvalidArgumentError, Option } from 'commander';
import { loadConfig } from '@/config/index.ts';
import type { AppConfig, ServerOverrides } from '@/config/index.ts';
import { createGoogleTransport } from '@/gcp/index.ts';
import type { GcpTransport } from '@/gcp/index.ts';
import { serveSse, serveStdio } from '@/server/index.ts';
import type { RunningServer } from '@/server/index.ts';
import {
  createDispatcher,
  createToolGroups,
  createToolRegistry,
  registerToolGroups,
} from '@/tool/index.ts';
import type { Dispatcher, ToolGroupOptions, ToolRegistry } from '@/tool/index.ts';

const SHUTDOWN_GRACE_MS = 5000;

export type App = {
  readonly registry: ToolRegistry;
  readonly dispatcher: Dispatcher;
};

type CliOptions = {
  config?: string;
  mode?: string;
  port?: number;
  baseUrl?: string;
};

/**
 * Build the sealed registry and dispatcher. Throws ToolRegistrationError when any area fails.
 */
export function createApp(
  config: AppConfig,
  transport: GcpTransport,
  options: ToolGroupOptions = {},
): App {
  const registry = createToolRegistry();
  registerToolGroups(registry, createToolGroups(transport, options));

  const dispatcher = createDispatcher(registry, {
    timeoutMs: config.tools.request_timeout_ms,
    onError: (toolName, message) => {
      console.error(`[dispatch] ${toolName} failed: ${message}`);
    },
  });

  return { registry, dispatcher };
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('port must be an integer between 1 and 65535');
  }
  return port;
}

export function parseArgs(argv: ReadonlyArray<string>): { configPath?: string; overrides: ServerOverrides } {
  const program = new Command()
    .name('gcp-triage')
    .description('MCP server exposing read-only Google Cloud diagnostic tools')
    .option('-c, --config <path>', 'path to config.toml')
    .addOption(new Option('--mode <mode>', 'transport to serve on').choices(['stdio', 'sse']))
    .option('--port <port>', 'SSE listen port', parsePort)
    .option('--base-url <url>', 'public base URL of the SSE endpoint')
    .parse([...argv]);

  const opts = program.opts<CliOptions>();
  const mode = opts.mode === 'stdio' || opts.mode === 'sse' ? opts.mode : undefined;

  return {
    configPath: opts.config,
    overrides: { mode, port: opts.port, base_url: opts.baseUrl },
  };
}

/**
 * Close the server, then exit. Exits with status 1 if closing outlasts the grace period.
 */
export function createShutdownHandler(
  running: RunningServer,
  graceMs: number = SHUTDOWN_GRACE_MS,
): () => Promise<void> {
  let closing = false;

  return async (): Promise<void> => {
    if (closing) {
      return;
    }
    closing = true;
    console.error('[server] shutting down');

    const timer = setTimeout(() => {
      console.error(`[server] shutdown did not finish within ${graceMs}ms`);
      process.exit(1);
    }, graceMs);
    timer.unref();

    try {
      await running.close();
      process.exit(0);
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      console.error(`[server] shutdown failed: ${errorMsg}`);
      process.exit(1);
    }
  };
}

async function main(): Promise<void> {
  const { configPath, overrides } = parseArgs(process.argv);
  const config = loadConfig(configPath, overrides);

  const app = createApp(config, createGoogleTransport(config.auth));
  console.error(`[startup] registered ${app.registry.getDefinitions().length} tools`);

  const serverOptions = {
    ...app,
    name: config.server.name,
    version: config.server.version,
  };

  const running =
    config.server.mode === 'sse'
      ? await serveSse({
          ...serverOptions,
          host: config.server.host,
          port: config.server.port,
          baseUrl: config.server.base_url,
        })
      : await serveStdio(serverOptions);

  const shutdownHandler = createShutdownHandler(running);
  process.on('SIGINT', shutdownHandler);
  process.on('SIGTERM', shutdownHandler);
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main().catch((error: unknown) => {
    const errorMsg = error instanceof Error ? error.message : String(error);
    console.error(`fatal: ${errorMsg}`);
    process.exit(1);
  });
}
