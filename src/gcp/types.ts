// pattern: Functional Core (types only)

/**
 * Port types for the authenticated Google Cloud transport.
 * Handlers depend on these; the google-auth-library adapter and test stubs implement them.
 */

export type ApiRequest = {
  readonly method: 'GET' | 'POST';
  readonly url: string;
  readonly body?: unknown;
};

export type ApiResponse = {
  readonly ok: boolean;
  readonly status: number;
  readonly statusText: string;
  json(): Promise<unknown>;
};

export interface HttpClient {
  send(request: ApiRequest, signal: AbortSignal): Promise<ApiResponse>;
}

/**
 * Produces a client able to perform authorised requests, or rejects when credentials are unusable.
 */
export type GcpTransport = (signal: AbortSignal) => Promise<HttpClient>;

export type TokenSource = () => Promise<string>;
