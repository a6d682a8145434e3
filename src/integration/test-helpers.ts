// pattern: Functional Core

/**
 * Shared test utilities.
 * Provides an in-process stand-in for the authenticated Google Cloud transport.
 */

import type { ApiRequest, ApiResponse, GcpTransport } from '../gcp/types.ts';
import { createDispatcher } from '../tool/dispatch.ts';
import { createToolRegistry } from '../tool/registry.ts';
import type { Dispatcher, Tool } from '../tool/types.ts';

export type StubReply =
  | { readonly status?: number; readonly statusText?: string; readonly body?: unknown }
  | Error;

export type StubTransport = {
  readonly transport: GcpTransport;
  readonly requests: Array<ApiRequest>;
};

export const FIXED_NOW = new Date('2024-05-01T12:00:00.000Z');

export function fixedClock(): Date {
  return new Date(FIXED_NOW.getTime());
}

export function ok(body: unknown): StubReply {
  return { status: 200, statusText: 'OK', body };
}

function toResponse(reply: Exclude<StubReply, Error>): ApiResponse {
  const status = reply.status ?? 200;
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: reply.statusText ?? '',
    json: async () => reply.body ?? {},
  };
}

/**
 * A transport whose client answers each request with `reply(request)`.
 * A reply that is an Error makes `send` reject with it. Every request is recorded.
 */
export function createStubTransport(reply: (request: ApiRequest) => StubReply): StubTransport {
  const requests: Array<ApiRequest> = [];

  const transport: GcpTransport = async () => ({
    send: async (request) => {
      requests.push(request);
      const outcome = reply(request);
      if (outcome instanceof Error) {
        throw outcome;
      }
      return toResponse(outcome);
    },
  });

  return { transport, requests };
}

/**
 * Route replies by a substring of the request URL; unmatched requests get a 404.
 */
export function routeByUrl(routes: Readonly<Record<string, StubReply>>): (request: ApiRequest) => StubReply {
  return (request) => {
    for (const [fragment, reply] of Object.entries(routes)) {
      if (request.url.includes(fragment)) {
        return reply;
      }
    }
    return { status: 404, statusText: 'Not Found' };
  };
}

/**
 * A dispatcher over exactly `tools`, for exercising handlers through validation.
 */
export function dispatcherFor(tools: ReadonlyArray<Tool>): Dispatcher {
  const registry = createToolRegistry();
  for (const tool of tools) {
    registry.register(tool);
  }
  registry.seal();
  return createDispatcher(registry);
}
