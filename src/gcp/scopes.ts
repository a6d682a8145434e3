// pattern: Functional Core

/**
 * OAuth scopes needed by the diagnostic tools. Nothing here grants write access.
 */
export const READ_ONLY_SCOPES: ReadonlyArray<string> = [
  'https://www.googleapis.com/auth/cloud-platform.read-only',
  'https://www.googleapis.com/auth/logging.read',
  'https://www.googleapis.com/auth/monitoring.read',
  'https://www.googleapis.com/auth/compute.readonly',
  'https://www.googleapis.com/auth/container.readonly',
];
