// pattern: Imperative Shell

/**
 * GKE cluster tools backed by the Container API v1.
 */

import { z } from 'zod';
import { buildUrl, callApi } from '../../gcp/index.ts';
import type { GcpTransport } from '../../gcp/index.ts';
import { createReportBuilder, enabledLabel, formatTimestamp, yesNo } from '../../render/index.ts';
import type { ReportBuilder } from '../../render/index.ts';
import { textResult } from '../result.ts';
import type { Tool, ToolParameter } from '../types.ts';

const CONTAINER_API_BASE = 'https://container.googleapis.com/v1';
const CONTAINER_API = 'Container API';

const AddonSchema = z.object({ disabled: z.boolean().optional() });

const ClusterSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  location: z.string().optional(),
  status: z.string().optional(),
  currentNodeCount: z.number().optional(),
  currentMasterVersion: z.string().optional(),
  currentNodeVersion: z.string().optional(),
  network: z.string().optional(),
  subnetwork: z.string().optional(),
  clusterIpv4Cidr: z.string().optional(),
  servicesIpv4Cidr: z.string().optional(),
  endpoint: z.string().optional(),
  createTime: z.string().optional(),
  locations: z.array(z.string()).optional(),
  resourceLabels: z.record(z.string()).optional(),
  addonsConfig: z
    .object({
      httpLoadBalancing: AddonSchema.optional(),
      horizontalPodAutoscaling: AddonSchema.optional(),
      kubernetesDashboard: AddonSchema.optional(),
      networkPolicyConfig: AddonSchema.optional(),
    })
    .optional(),
  maintenancePolicy: z
    .object({
      window: z
        .object({
          dailyMaintenanceWindow: z
            .object({
              startTime: z.string().optional(),
              duration: z.string().optional(),
            })
            .optional(),
        })
        .optional(),
    })
    .optional(),
});

const ListClustersSchema = z.object({
  clusters: z.array(ClusterSchema).optional(),
});

const NodePoolSchema = z.object({
  name: z.string(),
  status: z.string().optional(),
  version: z.string().optional(),
  initialNodeCount: z.number().optional(),
  locations: z.array(z.string()).optional(),
  config: z
    .object({
      machineType: z.string().optional(),
      diskSizeGb: z.number().optional(),
      oauthScopes: z.array(z.string()).optional(),
      serviceAccount: z.string().optional(),
      preemptible: z.boolean().optional(),
      labels: z.record(z.string()).optional(),
    })
    .optional(),
  autoscaling: z
    .object({
      enabled: z.boolean().optional(),
      minNodeCount: z.number().optional(),
      maxNodeCount: z.number().optional(),
    })
    .optional(),
  management: z
    .object({
      autoUpgrade: z.boolean().optional(),
      autoRepair: z.boolean().optional(),
    })
    .optional(),
});

const ListNodePoolsSchema = z.object({
  nodePools: z.array(NodePoolSchema).optional(),
});

type Cluster = z.infer<typeof ClusterSchema>;
type NodePool = z.infer<typeof NodePoolSchema>;

const projectIdParameter: ToolParameter = {
  name: 'project_id',
  type: 'string',
  description: 'The Google Cloud project ID',
  required: true,
};

const clusterParameters: ReadonlyArray<ToolParameter> = [
  projectIdParameter,
  {
    name: 'location',
    type: 'string',
    description: 'The location of the cluster',
    required: true,
  },
  {
    name: 'cluster_name',
    type: 'string',
    description: 'The name of the cluster',
    required: true,
  },
];

function clusterPath(projectId: string, location: string, clusterName?: string): string {
  const base = `/projects/${encodeURIComponent(projectId)}/locations/${encodeURIComponent(location)}/clusters`;
  return clusterName === undefined ? base : `${base}/${encodeURIComponent(clusterName)}`;
}

function versionLine(cluster: Cluster): string {
  return `${cluster.currentMasterVersion ?? 'unknown'} (master) / ${cluster.currentNodeVersion ?? 'unknown'} (nodes)`;
}

function labelLines(labels: Readonly<Record<string, string>> | undefined): Array<string> {
  return Object.entries(labels ?? {}).map(([key, value]) => `${key}: ${value}`);
}

function summariseCluster(report: ReportBuilder, cluster: Cluster): void {
  report
    .optionalField('Location', cluster.location)
    .optionalField('Status', cluster.status)
    .field('Node Count', cluster.currentNodeCount ?? 0)
    .field('Kubernetes Version', versionLine(cluster))
    .optionalField('Endpoint', cluster.endpoint);
}

function renderClusterList(
  clusters: ReadonlyArray<Cluster>,
  projectId: string,
  location: string | undefined,
): string {
  const scope = location === undefined ? '' : ` in location ${location}`;
  if (clusters.length === 0) {
    return `No GKE clusters found in project ${projectId}${scope}.`;
  }

  const report = createReportBuilder().paragraph(
    `Found ${clusters.length} GKE clusters in project ${projectId}${scope}:`,
  );

  clusters.forEach((cluster, i) => {
    report.heading(3, `${i + 1}. Cluster: ${cluster.name}`);
    summariseCluster(report, cluster);
    report
      .optionalField('Network', cluster.network)
      .optionalField('Subnetwork', cluster.subnetwork)
      .optionalField('Pod CIDR', cluster.clusterIpv4Cidr)
      .optionalField('Service CIDR', cluster.servicesIpv4Cidr)
      .optionalField('Created', cluster.createTime && formatTimestamp(cluster.createTime))
      .optionalField('Description', cluster.description);
  });

  return report.toString();
}

function renderClusterInfo(cluster: Cluster): string {
  const report = createReportBuilder().heading(1, `GKE Cluster: ${cluster.name}`);

  report.heading(2, 'Basic Information');
  summariseCluster(report, cluster);
  report
    .optionalField('Created', cluster.createTime && formatTimestamp(cluster.createTime))
    .optionalField('Description', cluster.description);

  const network: Array<[string, string | undefined]> = [
    ['Network', cluster.network],
    ['Subnetwork', cluster.subnetwork],
    ['Pod CIDR', cluster.clusterIpv4Cidr],
    ['Service CIDR', cluster.servicesIpv4Cidr],
  ];
  if (network.some(([, value]) => value)) {
    report.heading(2, 'Network Configuration');
    for (const [label, value] of network) {
      report.optionalField(label, value);
    }
  }

  const addons = cluster.addonsConfig;
  if (addons) {
    const entries: Array<[string, { disabled?: boolean } | undefined]> = [
      ['HTTP Load Balancing', addons.httpLoadBalancing],
      ['Horizontal Pod Autoscaling', addons.horizontalPodAutoscaling],
      ['Kubernetes Dashboard', addons.kubernetesDashboard],
      ['Network Policy', addons.networkPolicyConfig],
    ];
    const present = entries.filter(([, addon]) => addon !== undefined);
    if (present.length > 0) {
      report.heading(2, 'Add-ons Configuration');
      for (const [label, addon] of present) {
        report.field(label, enabledLabel(addon?.disabled !== true));
      }
    }
  }

  const locations = cluster.locations ?? [];
  if (locations.length > 0) {
    report.heading(2, 'Node Locations');
    for (const location of locations) {
      report.bullet(location);
    }
  }

  const labels = Object.entries(cluster.resourceLabels ?? {});
  if (labels.length > 0) {
    report.heading(2, 'Resource Labels');
    for (const [key, value] of labels) {
      report.field(key, value);
    }
  }

  const window = cluster.maintenancePolicy?.window?.dailyMaintenanceWindow;
  if (window?.startTime) {
    report
      .heading(2, 'Maintenance Window')
      .field('Start Time', window.startTime)
      .optionalField('Duration', window.duration);
  }

  return report.toString();
}

function renderNodePool(report: ReportBuilder, pool: NodePool, index: number): void {
  report
    .heading(2, `${index + 1}. Node Pool: ${pool.name}`)
    .optionalField('Status', pool.status)
    .optionalField('Version', pool.version)
    .field('Initial Node Count', pool.initialNodeCount ?? 0);

  const config = pool.config;
  if (config) {
    report
      .heading(3, 'Machine Configuration')
      .optionalField('Machine Type', config.machineType)
      .optionalField('Disk Size', config.diskSizeGb === undefined ? undefined : `${config.diskSizeGb} GB`)
      .field('Preemptible', yesNo(config.preemptible === true))
      .optionalField('Service Account', config.serviceAccount)
      .nestedList('OAuth Scopes', config.oauthScopes ?? [])
      .nestedList('Labels', labelLines(config.labels));
  }

  report.heading(3, 'Autoscaling');
  if (pool.autoscaling?.enabled) {
    report
      .field('Enabled', 'Yes')
      .field('Min Nodes', pool.autoscaling.minNodeCount ?? 0)
      .field('Max Nodes', pool.autoscaling.maxNodeCount ?? 0);
  } else {
    report.field('Enabled', 'No');
  }

  if (pool.management) {
    report
      .heading(3, 'Management')
      .field('Auto Upgrade', yesNo(pool.management.autoUpgrade === true))
      .field('Auto Repair', yesNo(pool.management.autoRepair === true));
  }

  const locations = pool.locations ?? [];
  if (locations.length > 0) {
    report.heading(3, 'Locations');
    for (const location of locations) {
      report.bullet(location);
    }
  }
}

function renderNodePools(pools: ReadonlyArray<NodePool>, clusterName: string, location: string): string {
  if (pools.length === 0) {
    return `No node pools found in cluster ${clusterName} in location ${location}.`;
  }

  const report = createReportBuilder().heading(1, `Node Pools in Cluster ${clusterName}`);
  pools.forEach((pool, i) => renderNodePool(report, pool, i));
  return report.toString();
}

export function createClusterTools(transport: GcpTransport): Array<Tool> {
  const list_clusters: Tool = {
    definition: {
      name: 'list_clusters',
      description: 'Lists GKE clusters in a project',
      parameters: [
        projectIdParameter,
        {
          name: 'location',
          type: 'string',
          description:
            'The location to list clusters from (optional, if not provided, all locations will be queried)',
          required: false,
        },
      ],
    },
    handler: async (args, { signal }) => {
      const projectId = args.string('project_id');
      const location = args.optionalString('location');

      const response = await callApi(
        transport,
        {
          api: CONTAINER_API,
          request: {
            method: 'GET',
            url: buildUrl(CONTAINER_API_BASE, clusterPath(projectId, location ?? '-')),
          },
          schema: ListClustersSchema,
        },
        signal,
      );

      return textResult(renderClusterList(response.clusters ?? [], projectId, location));
    },
  };

  const get_cluster_info: Tool = {
    definition: {
      name: 'get_cluster_info',
      description: 'Gets detailed information about a GKE cluster',
      parameters: clusterParameters,
    },
    handler: async (args, { signal }) => {
      const cluster = await callApi(
        transport,
        {
          api: CONTAINER_API,
          request: {
            method: 'GET',
            url: buildUrl(
              CONTAINER_API_BASE,
              clusterPath(args.string('project_id'), args.string('location'), args.string('cluster_name')),
            ),
          },
          schema: ClusterSchema,
        },
        signal,
      );

      return textResult(renderClusterInfo(cluster));
    },
  };

  const list_node_pools: Tool = {
    definition: {
      name: 'list_node_pools',
      description: 'Lists node pools in a GKE cluster',
      parameters: clusterParameters,
    },
    handler: async (args, { signal }) => {
      const location = args.string('location');
      const clusterName = args.string('cluster_name');

      const response = await callApi(
        transport,
        {
          api: CONTAINER_API,
          request: {
            method: 'GET',
            url: buildUrl(
              CONTAINER_API_BASE,
              `${clusterPath(args.string('project_id'), location, clusterName)}/nodePools`,
            ),
          },
          schema: ListNodePoolsSchema,
        },
        signal,
      );

      return textResult(renderNodePools(response.nodePools ?? [], clusterName, location));
    },
  };

  return [list_clusters, get_cluster_info, list_node_pools];
}
