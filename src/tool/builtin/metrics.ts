// pattern: Imperative Shell

/**
 * Cloud Monitoring tools: aligned time series for one metric type, and open alert incidents.
 */

import { z } from 'zod';
import { buildUrl, callApi } from '../../gcp/index.ts';
import type { GcpTransport } from '../../gcp/index.ts';
import { createReportBuilder, formatTimestamp } from '../../render/index.ts';
import type { ReportBuilder } from '../../render/index.ts';
import { textResult } from '../result.ts';
import type { Tool } from '../types.ts';
import { windowStart } from './time-range.ts';

const MONITORING_API_BASE = 'https://monitoring.googleapis.com/v3';
const MONITORING_API = 'Monitoring API';

const TypedValueSchema = z.object({
  doubleValue: z.number().optional(),
  int64Value: z.union([z.string(), z.number()]).optional(),
  boolValue: z.boolean().optional(),
  stringValue: z.string().optional(),
});

const TimeSeriesSchema = z.object({
  metric: z
    .object({
      type: z.string().optional(),
      labels: z.record(z.string()).optional(),
    })
    .optional(),
  resource: z
    .object({
      type: z.string().optional(),
      labels: z.record(z.string()).optional(),
    })
    .optional(),
  points: z
    .array(
      z.object({
        interval: z
          .object({
            startTime: z.string().optional(),
            endTime: z.string().optional(),
          })
          .optional(),
        value: TypedValueSchema.optional(),
      }),
    )
    .optional(),
});

const ListTimeSeriesSchema = z.object({
  timeSeries: z.array(TimeSeriesSchema).optional(),
});

const AlertPolicySchema = z.object({
  name: z.string(),
  displayName: z.string().optional(),
  documentation: z.object({ content: z.string().optional() }).optional(),
  conditions: z
    .array(
      z.object({
        name: z.string(),
        displayName: z.string().optional(),
      }),
    )
    .optional(),
});

const ListAlertPoliciesSchema = z.object({
  alertPolicies: z.array(AlertPolicySchema).optional(),
});

const IncidentSchema = z.object({
  name: z.string().optional(),
  policyName: z.string().optional(),
  conditionName: z.string().optional(),
  resourceDisplayName: z.string().optional(),
  startTime: z.string().optional(),
  state: z.string().optional(),
  severity: z.string().optional(),
  summary: z.string().optional(),
});

const ListIncidentsSchema = z.object({
  incidents: z.array(IncidentSchema).optional(),
});

type TimeSeries = z.infer<typeof TimeSeriesSchema>;
type TypedValue = z.infer<typeof TypedValueSchema>;
type AlertPolicy = z.infer<typeof AlertPolicySchema>;
type Incident = z.infer<typeof IncidentSchema>;

const RECOMMENDED_ACTIONS: ReadonlyArray<string> = [
  'Check the affected resources for any recent changes or deployments',
  'Review logs around the time the alert was triggered',
  'Check for related alerts that might indicate a broader issue',
  'Verify resource utilization and performance metrics',
  'Consider scaling resources if the alert is related to resource constraints',
];

export type MetricToolsOptions = {
  readonly now: () => Date;
};

export function formatPointValue(value: TypedValue | undefined): string {
  if (!value) return 'N/A';
  if (value.doubleValue !== undefined) return value.doubleValue.toFixed(6);
  if (value.int64Value !== undefined) return String(value.int64Value);
  if (value.stringValue !== undefined) return value.stringValue;
  if (value.boolValue !== undefined) return String(value.boolValue);
  return 'N/A';
}

function renderSeries(report: ReportBuilder, series: TimeSeries, index: number): void {
  report.heading(2, `Time Series ${index + 1}`).heading(3, 'Labels');

  const labels = [
    ...Object.entries(series.metric?.labels ?? {}),
    ...Object.entries(series.resource?.labels ?? {}),
  ];
  report.optionalField('resource.type', series.resource?.type);
  for (const [key, value] of labels) {
    report.field(key, value);
  }
  if (labels.length === 0 && !series.resource?.type) {
    report.paragraph('No labels.');
  }

  report.heading(3, 'Data Points');
  const points = series.points ?? [];
  if (points.length === 0) {
    report.paragraph('No data points available.');
    return;
  }

  report.table(
    ['Time', 'Value'],
    points.map((point) => [formatTimestamp(point.interval?.endTime ?? ''), formatPointValue(point.value)]),
  );
}

function renderTimeSeries(series: ReadonlyArray<TimeSeries>, metricType: string): string {
  if (series.length === 0) {
    return `No metrics data found for metric type ${metricType} in the specified time range.`;
  }

  const report = createReportBuilder().heading(1, `Metrics Data for ${metricType}`);
  series.forEach((entry, i) => renderSeries(report, entry, i));
  return report.toString();
}

function renderAlerts(
  policies: ReadonlyArray<AlertPolicy>,
  incidents: ReadonlyArray<Incident>,
  projectId: string,
): string {
  const open = incidents.filter((incident) => incident.state === 'OPEN');
  if (open.length === 0) {
    return 'No active alerts found.';
  }

  const byName = new Map(policies.map((policy) => [policy.name, policy]));

  const report = createReportBuilder()
    .heading(1, `Active Alerts in Project ${projectId}`)
    .paragraph(`Found ${open.length} active alerts:`);

  open.forEach((incident, i) => {
    const policy = incident.policyName === undefined ? undefined : byName.get(incident.policyName);
    const condition = policy?.conditions?.find((c) => c.name === incident.conditionName);

    report
      .heading(2, `${i + 1}. Alert: ${incident.resourceDisplayName ?? 'unknown resource'}`)
      .field('Policy', policy?.displayName ?? 'Unknown Policy')
      .field('Condition', condition?.displayName ?? 'Unknown Condition')
      .optionalField('Severity', incident.severity)
      .optionalField('Started', incident.startTime && formatTimestamp(incident.startTime))
      .optionalField('Summary', incident.summary);

    const documentation = policy?.documentation?.content;
    if (documentation) {
      report.heading(3, 'Documentation').paragraph(documentation);
    }
  });

  return report.heading(2, 'Recommended Actions').numbered(RECOMMENDED_ACTIONS).toString();
}

export function createMetricTools(transport: GcpTransport, options: MetricToolsOptions): Array<Tool> {
  const { now } = options;

  const query_metrics: Tool = {
    definition: {
      name: 'query_metrics',
      description: 'Queries metrics from GCP Cloud Monitoring',
      parameters: [
        {
          name: 'project_id',
          type: 'string',
          description: 'The Google Cloud project ID',
          required: true,
        },
        {
          name: 'metric_type',
          type: 'string',
          description: 'The metric type to query (e.g., kubernetes.io/container/cpu/core_usage_time)',
          required: true,
        },
        {
          name: 'filter',
          type: 'string',
          description: 'Additional filter for the metrics query',
          required: false,
        },
        {
          name: 'time_range_hours',
          type: 'number',
          description: 'Time range for metrics in hours (default: 1)',
          required: false,
          default: 1,
          positive: true,
        },
        {
          name: 'alignment_period_seconds',
          type: 'number',
          description: 'Alignment period in seconds (default: 300)',
          required: false,
          default: 300,
          positive: true,
        },
      ],
    },
    handler: async (args, { signal }) => {
      const metricType = args.string('metric_type');
      const extra = args.optionalString('filter');
      const end = now();
      const start = windowStart(end, args.number('time_range_hours'));

      const filter = `metric.type="${metricType}"${extra === undefined ? '' : ` AND ${extra}`}`;

      const response = await callApi(
        transport,
        {
          api: MONITORING_API,
          request: {
            method: 'GET',
            url: buildUrl(
              MONITORING_API_BASE,
              `/projects/${encodeURIComponent(args.string('project_id'))}/timeSeries`,
              {
                filter,
                'interval.startTime': start.toISOString(),
                'interval.endTime': end.toISOString(),
                'aggregation.alignmentPeriod': `${Math.max(1, Math.round(args.number('alignment_period_seconds')))}s`,
                'aggregation.perSeriesAligner': 'ALIGN_MEAN',
              },
            ),
          },
          schema: ListTimeSeriesSchema,
        },
        signal,
      );

      return textResult(renderTimeSeries(response.timeSeries ?? [], metricType));
    },
  };

  const list_alerts: Tool = {
    definition: {
      name: 'list_alerts',
      description: 'Lists active alerts from GCP Cloud Monitoring',
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
          description: 'Additional filter for the alerts query',
          required: false,
        },
      ],
    },
    handler: async (args, { signal }) => {
      const projectId = args.string('project_id');
      const projectPath = `/projects/${encodeURIComponent(projectId)}`;

      const policies = await callApi(
        transport,
        {
          api: MONITORING_API,
          request: {
            method: 'GET',
            url: buildUrl(MONITORING_API_BASE, `${projectPath}/alertPolicies`, {
              filter: args.optionalString('filter'),
            }),
          },
          schema: ListAlertPoliciesSchema,
        },
        signal,
      );

      const incidents = await callApi(
        transport,
        {
          api: MONITORING_API,
          request: {
            method: 'GET',
            url: buildUrl(MONITORING_API_BASE, `${projectPath}/incidents`),
          },
          schema: ListIncidentsSchema,
        },
        signal,
      );

      return textResult(
        renderAlerts(policies.alertPolicies ?? [], incidents.incidents ?? [], projectId),
      );
    },
  };

  return [query_metrics, list_alerts];
}
