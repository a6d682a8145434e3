// pattern: Imperative Shell

/**
 * Capability areas served by the server. Each area builds its tools lazily so that
 * a failure in one (a bad docs catalogue, say) is reported against that area alone.
 */

import type { GcpTransport } from '../../gcp/index.ts';
import type { ToolGroup } from '../types.ts';
import { createClusterTools } from './clusters.ts';
import { createDocTools, loadDocsCatalog } from './docs.ts';
import { createIssueTools } from './issues.ts';
import { createLogTools } from './logs.ts';
import { createMetricTools } from './metrics.ts';

export type ToolGroupOptions = {
  readonly now?: () => Date;
  readonly docsCatalogPath?: string;
};

export function createToolGroups(
  transport: GcpTransport,
  options: ToolGroupOptions = {},
): Array<ToolGroup> {
  const now = options.now ?? (() => new Date());

  return [
    { area: 'issues', create: () => createIssueTools(transport) },
    { area: 'logs', create: () => createLogTools(transport, { now }) },
    { area: 'cluster info', create: () => createClusterTools(transport) },
    { area: 'metrics', create: () => createMetricTools(transport, { now }) },
    { area: 'docs', create: () => createDocTools(loadDocsCatalog(options.docsCatalogPath)) },
  ];
}

export { createClusterTools } from './clusters.ts';
export { createDocTools, loadDocsCatalog, DocsCatalogSchema } from './docs.ts';
export type { DocsCatalog } from './docs.ts';
export { createIssueTools, periodForHours } from './issues.ts';
export { createLogTools } from './logs.ts';
export { createMetricTools } from './metrics.ts';
