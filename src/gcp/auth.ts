// pattern: Imperative Shell

/**
 * google-auth-library adapter for the GcpTransport port.
 * Acquires an OAuth2 access token per call and sends requests with fetch and a Bearer header.
 */

import { GoogleAuth, OAuth2Client } from 'google-auth-library';
import type { AuthConfig } from '../config/schema.ts';
import type { ApiRequest, ApiResponse, GcpTransport, HttpClient, TokenSource } from './types.ts';

export function createTokenSource(config: AuthConfig): TokenSource {
  if (config.credentials_file) {
    const auth = new GoogleAuth({
      keyFilename: config.credentials_file,
      scopes: [...config.scopes],
    });
    return async () => {
      const token = await auth.getAccessToken();
      if (!token) {
        throw new Error('credentials file did not yield an access token');
      }
      return token;
    };
  }

  const client = new OAuth2Client(config.client_id, config.client_secret);
  if (config.refresh_token) {
    client.setCredentials({ refresh_token: config.refresh_token, scope: config.scopes.join(' ') });
  }
  return async () => {
    const { token } = await client.getAccessToken();
    if (!token) {
      throw new Error('OAuth client has no usable token; set GOOGLE_REFRESH_TOKEN');
    }
    return token;
  };
}

function createFetchClient(token: string): HttpClient {
  return {
    async send(request: ApiRequest, signal: AbortSignal): Promise<ApiResponse> {
      const headers: Record<string, string> = {
        Authorization: `Bearer ${token}`,
        Accept: 'application/json',
      };
      if (request.body !== undefined) {
        headers['Content-Type'] = 'application/json';
      }

      return fetch(request.url, {
        method: request.method,
        headers,
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal,
      });
    },
  };
}

export function createTokenTransport(getToken: TokenSource): GcpTransport {
  return async (signal: AbortSignal): Promise<HttpClient> => {
    signal.throwIfAborted();
    const token = await getToken();
    return createFetchClient(token);
  };
}

export function createGoogleTransport(config: AuthConfig): GcpTransport {
  return createTokenTransport(createTokenSource(config));
}
