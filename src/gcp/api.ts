// pattern: Imperative Shell

/**
 * Request helpers for Google Cloud REST APIs.
 * One round trip: obtain a client, send, check the status, decode and validate the JSON body.
 */

import type { z } from 'zod';
import type { ApiRequest, ApiResponse, GcpTransport, HttpClient } from './types.ts';

export type GcpErrorCode = 'auth' | 'network' | 'status' | 'decode';

export class GcpError extends Error {
  constructor(
    public code: GcpErrorCode,
    message: string,
    public status?: number,
  ) {
    super(message);
    this.name = 'GcpError';
  }
}

export type ApiCall<T> = {
  /** Human name used in error messages, e.g. "Container API". */
  readonly api: string;
  readonly request: ApiRequest;
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
};

type QueryValue = string | number | undefined;

export function buildUrl(
  base: string,
  path: string,
  query: Readonly<Record<string, QueryValue>> = {},
): string {
  const url = new URL(`${base}${path}`);
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined && value !== '') {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export async function callApi<T>(
  transport: GcpTransport,
  call: ApiCall<T>,
  signal: AbortSignal,
): Promise<T> {
  let client: HttpClient;
  try {
    client = await transport(signal);
  } catch (error) {
    throw new GcpError('auth', `Error getting authenticated client: ${errorMessage(error)}`);
  }

  let response: ApiResponse;
  try {
    response = await client.send(call.request, signal);
  } catch (error) {
    throw new GcpError('network', `Error making request to ${call.api}: ${errorMessage(error)}`);
  }

  if (!response.ok) {
    throw new GcpError(
      'status',
      `Error from ${call.api}: ${response.status} ${response.statusText}`.trimEnd(),
      response.status,
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new GcpError('decode', `Error parsing response: ${errorMessage(error)}`);
  }

  const parsed = call.schema.safeParse(body);
  if (!parsed.success) {
    throw new GcpError('decode', `Error parsing response: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}
