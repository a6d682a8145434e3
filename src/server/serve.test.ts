// pattern: Imperative Shell

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { createDocTools, loadDocsCatalog } from '../tool/builtin/index.ts';
import { createDispatcher } from '../tool/dispatch.ts';
import { createToolRegistry } from '../tool/registry.ts';
import { serveSse, sseRoutes } from './serve.ts';
import type { RunningSseServer } from './serve.ts';

const SESSION_EVENT = /^event: endpoint\ndata: (\/triage\/message\?sessionId=([\w-]+))\n\n/;

function docsOnly() {
  const registry = createToolRegistry();
  for (const tool of createDocTools(loadDocsCatalog())) {
    registry.register(tool);
  }
  registry.seal();
  return { registry, dispatcher: createDispatcher(registry) };
}

async function readUntilBlankLine(body: ReadableStream<Uint8Array>): Promise<{
  text: string;
  reader: ReadableStreamDefaultReader<Uint8Array>;
}> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let text = '';
  while (!text.includes('\n\n')) {
    const chunk = await reader.read();
    if (chunk.done) {
      break;
    }
    text += decoder.decode(chunk.value, { stream: true });
  }
  return { text, reader };
}

describe('sseRoutes', () => {
  it('should serve at the root when the base URL has no path', () => {
    expect(sseRoutes('http://localhost:8080')).toEqual({ ssePath: '/sse', messagePath: '/message' });
  });

  it('should prefix both routes with the base URL path', () => {
    expect(sseRoutes('https://ops.example.test/triage/')).toEqual({
      ssePath: '/triage/sse',
      messagePath: '/triage/message',
    });
  });
});

describe('serveSse', () => {
  let errorSpy: MockInstance;
  let running: RunningSseServer | undefined;
  let origin = '';

  beforeEach(async () => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    running = await serveSse({
      ...docsOnly(),
      name: 'gcp-triage-test',
      version: '0.0.0',
      host: '127.0.0.1',
      port: 0,
      baseUrl: 'http://127.0.0.1/triage',
    });
    origin = `http://127.0.0.1:${running.address().port}`;
  });

  afterEach(async () => {
    await running?.close();
    running = undefined;
    errorSpy.mockRestore();
  });

  it('should announce a prefixed message endpoint when a session opens', async () => {
    const response = await fetch(`${origin}/triage/sse`);

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('text/event-stream');
    if (!response.body) {
      throw new Error('expected an event stream body');
    }
    const { text, reader } = await readUntilBlankLine(response.body);
    await reader.cancel();

    expect(text).toMatch(SESSION_EVENT);
  });

  it('should answer tools/list over the SSE transport', async () => {
    const client = new Client({ name: 'test-client', version: '0.0.0' });
    await client.connect(new SSEClientTransport(new URL(`${origin}/triage/sse`)));

    try {
      const { tools } = await client.listTools();
      expect(tools.map((tool) => tool.name)).toEqual([
        'search_gcp_docs',
        'search_k8s_docs',
        'get_error_docs',
      ]);
    } finally {
      await client.close();
    }
  });

  it('should reject messages for an unknown session', async () => {
    const response = await fetch(`${origin}/triage/message?sessionId=no-such-session`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{}',
    });

    expect(response.status).toBe(404);
    expect(await response.text()).toBe('unknown session');
  });

  it('should reject messages without a session id', async () => {
    const response = await fetch(`${origin}/triage/message`, { method: 'POST', body: '{}' });

    expect(response.status).toBe(404);
    expect(await response.text()).toBe('unknown session');
  });

  it('should answer 404 outside the configured routes', async () => {
    const unprefixed = await fetch(`${origin}/sse`);
    const other = await fetch(`${origin}/triage/health`);

    expect(unprefixed.status).toBe(404);
    expect(await unprefixed.text()).toBe('not found');
    expect(other.status).toBe(404);
    expect(await other.text()).toBe('not found');
  });

  it('should end open sessions and stop listening on close', async () => {
    const response = await fetch(`${origin}/triage/sse`);
    if (!response.body) {
      throw new Error('expected an event stream body');
    }
    const { text, reader } = await readUntilBlankLine(response.body);
    const sessionPath = SESSION_EVENT.exec(text)?.[1];

    await running?.close();
    running = undefined;

    const next = await reader.read();
    expect(next.done).toBe(true);
    expect(sessionPath).toBeDefined();
    await expect(fetch(`${origin}${sessionPath ?? ''}`, { method: 'POST', body: '{}' })).rejects.toThrow();
  });
});
