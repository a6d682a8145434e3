// pattern: Imperative Shell

/**
 * Cloud Logging tools: free-form filter queries and per-pod container logs.
 */

import { z } from 'zod';
import { buildUrl, callApi } from '../../gcp/index.ts';
import type { GcpTransport } from '../../gcp/index.ts';
import { createReportBuilder, formatTimestamp } from '../../render/index.ts';
import { textResult } from '../result.ts';
import type { Tool } from '../types.ts';
import { windowStart } from './time-range.ts';

const LOGGING_API_BASE = 'https://logging.googleapis.com/v2';
const LOGGING_API = 'Logging API';

const LogEntrySchema = z.object({
  logName: z.string().optional(),
  timestamp: z.string().optional(),
  severity: z.string().optional(),
  textPayload: z.string().optional(),
  jsonPayload: z.record(z.unknown()).optional(),
  labels: z.record(z.string()).optional(),
  resource: z
    .object({
      type: z.string().optional(),
      labels: z.record(z.string()).optional(),
    })
    .optional(),
});

const ListEntriesSchema = z.object({
  entries: z.array(LogEntrySchema).optional(),
  nextPageToken: z.string().optional(),
});

type LogEntry = z.infer<typeof LogEntrySchema>;

export type LogToolsOptions = {
  readonly now: () => Date;
};

/**
 * RFC3339 with second precision, the form Logging filters compare against.
 */
function rfc3339(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function timeWindow(now: Date, hours: number): string {
  const start = windowStart(now, hours);
  return `timestamp >= "${rfc3339(start)}" AND timestamp <= "${rfc3339(now)}"`;
}

function labelLines(labels: Readonly<Record<string, string>> | undefined): Array<string> {
  return Object.entries(labels ?? {}).map(([key, value]) => `${key}: ${value}`);
}

function payloadLine(entry: LogEntry): string {
  if (entry.textPayload) {
    return entry.textPayload;
  }
  if (entry.jsonPayload) {
    const message = entry.jsonPayload['message'];
    if (message !== undefined) {
      return typeof message === 'string' ? message : JSON.stringify(message);
    }
    return JSON.stringify(entry.jsonPayload);
  }
  return '';
}

function renderEntries(entries: ReadonlyArray<LogEntry>, hasMore: boolean): string {
  if (entries.length === 0) {
    return 'No logs found matching the filter criteria.';
  }

  const report = createReportBuilder().paragraph(
    `Found ${entries.length} log entries matching the filter criteria:`,
  );

  entries.forEach((entry, i) => {
    report
      .heading(3, `Log Entry ${i + 1}`)
      .optionalField('Timestamp', entry.timestamp && formatTimestamp(entry.timestamp))
      .optionalField('Severity', entry.severity)
      .optionalField('Log Name', entry.logName)
      .optionalField('Resource Type', entry.resource?.type)
      .nestedList('Resource Labels', labelLines(entry.resource?.labels))
      .nestedList('Labels', labelLines(entry.labels));

    if (entry.textPayload) {
      report.bullet('**Payload**:').code(entry.textPayload);
    } else if (entry.jsonPayload) {
      report.bullet('**Payload**:').code(JSON.stringify(entry.jsonPayload, null, 2), 'json');
    } else {
      report.field('Payload', 'No payload');
    }
  });

  if (hasMore) {
    report.paragraph(
      'Note: There are more log entries available. Refine your filter or increase max_results to see more.',
    );
  }

  return report.toString();
}

type PodQuery = {
  readonly podName: string;
  readonly namespace: string;
  readonly containerName: string | undefined;
  readonly hours: number;
};

function renderPodLogs(entries: ReadonlyArray<LogEntry>, query: PodQuery, hasMore: boolean): string {
  if (entries.length === 0) {
    return `No logs found for pod ${query.podName} in namespace ${query.namespace}.`;
  }

  const container = query.containerName === undefined ? '' : `, container ${query.containerName}`;
  // entries arrive newest first
  const lines = [...entries].reverse().map((entry) => {
    const time = formatTimestamp(entry.timestamp ?? '');
    const message = payloadLine(entry);
    if (query.containerName !== undefined) {
      return `[${time}] ${message}`;
    }
    return `[${time}] [${entry.resource?.labels?.['container_name'] ?? ''}] ${message}`;
  });

  const report = createReportBuilder()
    .heading(2, `Logs for pod ${query.podName}${container} in namespace ${query.namespace}`)
    .paragraph(`Found ${entries.length} log entries in the last ${query.hours.toFixed(1)} hours:`)
    .code(lines.join('\n'));

  if (hasMore) {
    report.paragraph(
      'Note: There are more log entries available. Increase time_range_hours or max_results to see more.',
    );
  }

  return report.toString();
}

function podFilter(
  projectId: string,
  location: string,
  clusterName: string,
  namespace: string,
  podName: string,
  containerName: string | undefined,
): string {
  const clauses = [
    'resource.type="k8s_container"',
    `resource.labels.project_id="${projectId}"`,
    `resource.labels.location="${location}"`,
    `resource.labels.cluster_name="${clusterName}"`,
    `resource.labels.namespace_name="${namespace}"`,
    `resource.labels.pod_name="${podName}"`,
  ];
  if (containerName !== undefined) {
    clauses.push(`resource.labels.container_name="${containerName}"`);
  }
  return clauses.join(' AND ');
}

export function createLogTools(transport: GcpTransport, options: LogToolsOptions): Array<Tool> {
  const { now } = options;

  async function listEntries(
    projectId: string,
    filter: string,
    pageSize: number,
    signal: AbortSignal,
  ): Promise<z.infer<typeof ListEntriesSchema>> {
    return callApi(
      transport,
      {
        api: LOGGING_API,
        request: {
          method: 'POST',
          url: buildUrl(LOGGING_API_BASE, '/entries:list'),
          body: {
            resourceNames: [`projects/${projectId}`],
            filter,
            orderBy: 'timestamp desc',
            pageSize: Math.max(1, Math.floor(pageSize)),
          },
        },
        schema: ListEntriesSchema,
      },
      signal,
    );
  }

  const query_logs: Tool = {
    definition: {
      name: 'query_logs',
      description: 'Queries logs from GCP Cloud Logging',
      parameters: [
        {
          name: 'project_id',
          type: 'string',
          description: 'The Google Cloud project ID',
          required: true,
        },
        {
          name: 'filter',
          type: 'string',
          description: 'The filter expression for the logs query',
          required: true,
        },
        {
          name: 'time_range_hours',
          type: 'number',
          description: 'Time range for logs in hours (default: 1)',
          required: false,
          default: 1,
          positive: true,
        },
        {
          name: 'max_results',
          type: 'number',
          description: 'Maximum number of results to return (default: 50)',
          required: false,
          default: 50,
          positive: true,
        },
      ],
    },
    handler: async (args, { signal }) => {
      let filter = args.string('filter');
      if (!filter.includes('timestamp')) {
        filter = `${filter} AND ${timeWindow(now(), args.number('time_range_hours'))}`;
      }

      const response = await listEntries(
        args.string('project_id'),
        filter,
        args.number('max_results'),
        signal,
      );

      return textResult(renderEntries(response.entries ?? [], Boolean(response.nextPageToken)));
    },
  };

  const get_pod_logs: Tool = {
    definition: {
      name: 'get_pod_logs',
      description: 'Gets logs for a specific Kubernetes pod',
      parameters: [
        {
          name: 'project_id',
          type: 'string',
          description: 'The Google Cloud project ID',
          required: true,
        },
        {
          name: 'location',
          type: 'string',
          description: 'The GKE cluster location',
          required: true,
        },
        {
          name: 'cluster_name',
          type: 'string',
          description: 'The GKE cluster name',
          required: true,
        },
        {
          name: 'namespace',
          type: 'string',
          description: 'The Kubernetes namespace',
          required: true,
        },
        {
          name: 'pod_name',
          type: 'string',
          description: 'The name of the pod',
          required: true,
        },
        {
          name: 'container_name',
          type: 'string',
          description:
            'The name of the container (if not provided, logs from all containers will be returned)',
          required: false,
        },
        {
          name: 'time_range_hours',
          type: 'number',
          description: 'Time range for logs in hours (default: 1)',
          required: false,
          default: 1,
          positive: true,
        },
        {
          name: 'max_results',
          type: 'number',
          description: 'Maximum number of results to return (default: 100)',
          required: false,
          default: 100,
          positive: true,
        },
      ],
    },
    handler: async (args, { signal }) => {
      const projectId = args.string('project_id');
      const namespace = args.string('namespace');
      const podName = args.string('pod_name');
      const containerName = args.optionalString('container_name');
      const hours = args.number('time_range_hours');

      const filter = `${podFilter(
        projectId,
        args.string('location'),
        args.string('cluster_name'),
        namespace,
        podName,
        containerName,
      )} AND ${timeWindow(now(), hours)}`;

      const response = await listEntries(projectId, filter, args.number('max_results'), signal);

      return textResult(
        renderPodLogs(
          response.entries ?? [],
          { podName, namespace, containerName, hours },
          Boolean(response.nextPageToken),
        ),
      );
    },
  };

  return [query_logs, get_pod_logs];
}
