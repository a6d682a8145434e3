// pattern: Imperative Shell

/**
 * Error Reporting tools: active error groups and the recent events of one group.
 */

import { z } from 'zod';
import { buildUrl, callApi } from '../../gcp/index.ts';
import type { GcpTransport } from '../../gcp/index.ts';
import { createReportBuilder, formatTimestamp } from '../../render/index.ts';
import type { ReportBuilder } from '../../render/index.ts';
import { textResult } from '../result.ts';
import type { Tool } from '../types.ts';

const ERROR_REPORTING_API_BASE = 'https://clouderrorreporting.googleapis.com/v1beta1';
const ERROR_REPORTING_API = 'Error Reporting API';

const EVENTS_PAGE_SIZE = 10;

// int64 fields arrive as decimal strings in the JSON mapping
const Int64Schema = z.union([z.string(), z.number()]);

const ServiceContextSchema = z.object({
  service: z.string().optional(),
  version: z.string().optional(),
});

const GroupStatsSchema = z.object({
  group: z.object({
    name: z.string().optional(),
    groupId: z.string().optional(),
  }),
  count: Int64Schema.optional(),
  firstSeenTime: z.string().optional(),
  lastSeenTime: z.string().optional(),
  affectedServices: z.array(ServiceContextSchema).optional(),
});

const ListGroupStatsSchema = z.object({
  errorGroupStats: z.array(GroupStatsSchema).optional(),
});

const ErrorEventSchema = z.object({
  eventTime: z.string().optional(),
  serviceContext: ServiceContextSchema.optional(),
  message: z.string().optional(),
  context: z
    .object({
      httpRequest: z
        .object({
          method: z.string().optional(),
          url: z.string().optional(),
          userAgent: z.string().optional(),
          referrer: z.string().optional(),
          remoteIp: z.string().optional(),
        })
        .optional(),
      reportLocation: z
        .object({
          filePath: z.string().optional(),
          lineNumber: z.number().optional(),
          functionName: z.string().optional(),
        })
        .optional(),
    })
    .optional(),
});

const ListEventsSchema = z.object({
  errorEvents: z.array(ErrorEventSchema).optional(),
});

type GroupStats = z.infer<typeof GroupStatsSchema>;
type ErrorEvent = z.infer<typeof ErrorEventSchema>;
type ServiceContext = z.infer<typeof ServiceContextSchema>;

const NEXT_STEPS: ReadonlyArray<string> = [
  'Check the error messages and stack traces for clues about the root cause.',
  'Look for patterns in the affected services and versions.',
  'Check recent deployments or changes to affected services.',
  'Examine logs around the time of the errors for related issues.',
  'Consider temporary mitigations like rolling back to a previous version if errors persist.',
];

/**
 * Map a lookback in hours onto the smallest Error Reporting period that covers it.
 */
export function periodForHours(hours: number): string {
  if (hours <= 1) return 'PERIOD_1_HOUR';
  if (hours <= 6) return 'PERIOD_6_HOURS';
  if (hours <= 24) return 'PERIOD_1_DAY';
  if (hours <= 168) return 'PERIOD_1_WEEK';
  return 'PERIOD_30_DAYS';
}

function groupId(stats: GroupStats): string {
  if (stats.group.groupId) {
    return stats.group.groupId;
  }
  const name = stats.group.name ?? '';
  return name.slice(name.lastIndexOf('/') + 1);
}

function describeService(service: ServiceContext): string {
  return `${service.service ?? 'unknown'} (version: ${service.version ?? 'unknown'})`;
}

function renderGroupStats(stats: ReadonlyArray<GroupStats>, projectId: string): string {
  if (stats.length === 0) {
    return 'No active issues found in the specified time range.';
  }

  const report = createReportBuilder().paragraph(
    `Found ${stats.length} active issues in project ${projectId}:`,
  );

  stats.forEach((stat, i) => {
    report
      .heading(3, `${i + 1}. Error Group: ${groupId(stat)}`)
      .field('Count', `${String(stat.count ?? 0)} occurrences`)
      .optionalField('First Seen', stat.firstSeenTime && formatTimestamp(stat.firstSeenTime))
      .optionalField('Last Seen', stat.lastSeenTime && formatTimestamp(stat.lastSeenTime))
      .nestedList('Affected Services', (stat.affectedServices ?? []).map(describeService));
  });

  return report
    .paragraph('To get more details about a specific error group, use the get_issue_details tool.')
    .toString();
}

function renderEvent(report: ReportBuilder, event: ErrorEvent, index: number): void {
  report
    .heading(3, `Event ${index + 1}`)
    .optionalField('Time', event.eventTime && formatTimestamp(event.eventTime));

  if (event.serviceContext) {
    report.field('Service', describeService(event.serviceContext));
  }

  const location = event.context?.reportLocation;
  if (location) {
    report.field(
      'Location',
      `${location.filePath ?? 'unknown'}:${location.lineNumber ?? 0} in ${location.functionName ?? 'unknown'}`,
    );
  }

  const request = event.context?.httpRequest;
  if (request) {
    report
      .field('Request', `${request.method ?? ''} ${request.url ?? ''}`.trim())
      .optionalField('Remote IP', request.remoteIp)
      .optionalField('User-Agent', request.userAgent)
      .optionalField('Referrer', request.referrer);
  }

  if (event.message) {
    report.paragraph('**Error Message**:').code(event.message);
  }
}

function renderGroupDetails(events: ReadonlyArray<ErrorEvent>, errorGroupId: string): string {
  const report = createReportBuilder()
    .heading(1, `Error Group: ${errorGroupId}`)
    .heading(2, 'Recent Error Events');

  if (events.length === 0) {
    report.paragraph('No recent error events found.');
  } else {
    events.forEach((event, i) => renderEvent(report, event, i));
  }

  return report.heading(2, 'Potential Causes and Solutions').numbered(NEXT_STEPS).toString();
}

export function createIssueTools(transport: GcpTransport): Array<Tool> {
  const list_active_issues: Tool = {
    definition: {
      name: 'list_active_issues',
      description: 'Lists active issues from GCP Error Reporting',
      parameters: [
        {
          name: 'project_id',
          type: 'string',
          description: 'The Google Cloud project ID',
          required: true,
        },
        {
          name: 'time_range_hours',
          type: 'number',
          description: 'Time range for issues in hours (default: 24)',
          required: false,
          default: 24,
          positive: true,
        },
        {
          name: 'max_results',
          type: 'number',
          description: 'Maximum number of results to return (default: 10)',
          required: false,
          default: 10,
          positive: true,
        },
      ],
    },
    handler: async (args, { signal }) => {
      const projectId = args.string('project_id');

      const response = await callApi(
        transport,
        {
          api: ERROR_REPORTING_API,
          request: {
            method: 'GET',
            url: buildUrl(ERROR_REPORTING_API_BASE, `/projects/${encodeURIComponent(projectId)}/groupStats`, {
              'timeRange.period': periodForHours(args.number('time_range_hours')),
              pageSize: Math.max(1, Math.floor(args.number('max_results'))),
              order: 'COUNT_DESC',
              alignment: 'ALIGNMENT_EQUAL_ROUNDED',
            }),
          },
          schema: ListGroupStatsSchema,
        },
        signal,
      );

      return textResult(renderGroupStats(response.errorGroupStats ?? [], projectId));
    },
  };

  const get_issue_details: Tool = {
    definition: {
      name: 'get_issue_details',
      description: 'Gets detailed information about a specific error group',
      parameters: [
        {
          name: 'project_id',
          type: 'string',
          description: 'The Google Cloud project ID',
          required: true,
        },
        {
          name: 'error_group_id',
          type: 'string',
          description: 'The ID of the error group',
          required: true,
        },
      ],
    },
    handler: async (args, { signal }) => {
      const errorGroupId = args.string('error_group_id');

      const response = await callApi(
        transport,
        {
          api: ERROR_REPORTING_API,
          request: {
            method: 'GET',
            url: buildUrl(
              ERROR_REPORTING_API_BASE,
              `/projects/${encodeURIComponent(args.string('project_id'))}/events`,
              { groupId: errorGroupId, pageSize: EVENTS_PAGE_SIZE },
            ),
          },
          schema: ListEventsSchema,
        },
        signal,
      );

      return textResult(renderGroupDetails(response.errorEvents ?? [], errorGroupId));
    },
  };

  return [list_active_issues, get_issue_details];
}
