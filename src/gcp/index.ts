// pattern: Functional Core (barrel export)

export type { ApiRequest, ApiResponse, HttpClient, GcpTransport, TokenSource } from './types.ts';
export type { ApiCall, GcpErrorCode } from './api.ts';
export { GcpError, buildUrl, callApi } from './api.ts';
export { READ_ONLY_SCOPES } from './scopes.ts';
export {
  createGoogleTransport,
  createTokenSource,
  createTokenTransport,
} from './auth.ts';
