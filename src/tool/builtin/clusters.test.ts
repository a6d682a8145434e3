// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { createClusterTools } from './clusters.ts';
import { createStubTransport, dispatcherFor, ok } from '../../integration/test-helpers.ts';
import type { StubReply } from '../../integration/test-helpers.ts';
import { resultText } from '../result.ts';

function setup(reply: StubReply) {
  const stub = createStubTransport(() => reply);
  return { ...stub, dispatcher: dispatcherFor(createClusterTools(stub.transport)) };
}

describe('list_clusters', () => {
  it('should report an empty project with the all-locations wildcard', async () => {
    const { dispatcher, requests } = setup(ok({}));

    const result = await dispatcher.invoke('list_clusters', { project_id: 'demo' });

    expect(result).toEqual({
      content: [{ type: 'text', text: 'No GKE clusters found in project demo.' }],
      isError: false,
    });
    expect(requests[0]?.url).toBe('https://container.googleapis.com/v1/projects/demo/locations/-/clusters');
  });

  it('should name the location in the empty sentence when one was given', async () => {
    const { dispatcher } = setup(ok({ clusters: [] }));

    const result = await dispatcher.invoke('list_clusters', { project_id: 'demo', location: 'us-east1' });

    expect(resultText(result)).toBe('No GKE clusters found in project demo in location us-east1.');
  });

  it('should summarise each cluster', async () => {
    const { dispatcher, requests } = setup(
      ok({
        clusters: [
          {
            name: 'alpha',
            location: 'us-central1',
            status: 'RUNNING',
            currentNodeCount: 3,
            currentMasterVersion: '1.29.1',
            currentNodeVersion: '1.29.0',
            endpoint: '10.0.0.1',
            network: 'default',
            createTime: '2024-04-01T08:30:00Z',
          },
        ],
      }),
    );

    const result = await dispatcher.invoke('list_clusters', { project_id: 'demo', location: 'us-central1' });

    expect(requests[0]?.url).toBe(
      'https://container.googleapis.com/v1/projects/demo/locations/us-central1/clusters',
    );
    expect(resultText(result)).toBe(
      [
        'Found 1 GKE clusters in project demo in location us-central1:',
        '',
        '### 1. Cluster: alpha',
        '',
        '- **Location**: us-central1',
        '- **Status**: RUNNING',
        '- **Node Count**: 3',
        '- **Kubernetes Version**: 1.29.1 (master) / 1.29.0 (nodes)',
        '- **Endpoint**: 10.0.0.1',
        '- **Network**: default',
        '- **Created**: 2024-04-01 08:30:00',
      ].join('\n'),
    );
  });

  it('should require project_id without calling the API', async () => {
    const { dispatcher, requests } = setup(ok({}));

    const result = await dispatcher.invoke('list_clusters', {});

    expect(result.isError).toBe(true);
    expect(resultText(result)).toBe('missing required parameter: project_id');
    expect(requests.length).toBe(0);
  });
});

describe('get_cluster_info', () => {
  const args = { project_id: 'demo', location: 'us-central1', cluster_name: 'alpha' };

  it('should render the sections present in the cluster', async () => {
    const { dispatcher, requests } = setup(
      ok({
        name: 'alpha',
        status: 'RUNNING',
        currentNodeCount: 2,
        currentMasterVersion: '1.29.1',
        currentNodeVersion: '1.29.1',
        network: 'vpc-1',
        addonsConfig: { httpLoadBalancing: {}, kubernetesDashboard: { disabled: true } },
        locations: ['us-central1-a'],
        resourceLabels: { team: 'sre' },
        maintenancePolicy: {
          window: { dailyMaintenanceWindow: { startTime: '03:00', duration: 'PT4H0M0S' } },
        },
      }),
    );

    const result = await dispatcher.invoke('get_cluster_info', args);

    expect(requests[0]?.url).toBe(
      'https://container.googleapis.com/v1/projects/demo/locations/us-central1/clusters/alpha',
    );
    expect(resultText(result)).toBe(
      [
        '# GKE Cluster: alpha',
        '',
        '## Basic Information',
        '',
        '- **Status**: RUNNING',
        '- **Node Count**: 2',
        '- **Kubernetes Version**: 1.29.1 (master) / 1.29.1 (nodes)',
        '',
        '## Network Configuration',
        '',
        '- **Network**: vpc-1',
        '',
        '## Add-ons Configuration',
        '',
        '- **HTTP Load Balancing**: Enabled',
        '- **Kubernetes Dashboard**: Disabled',
        '',
        '## Node Locations',
        '',
        '- us-central1-a',
        '',
        '## Resource Labels',
        '',
        '- **team**: sre',
        '',
        '## Maintenance Window',
        '',
        '- **Start Time**: 03:00',
        '- **Duration**: PT4H0M0S',
      ].join('\n'),
    );
  });

  it('should omit sections for absent sub-objects', async () => {
    const { dispatcher } = setup(ok({ name: 'bare' }));

    const result = await dispatcher.invoke('get_cluster_info', args);

    expect(resultText(result)).toBe(
      [
        '# GKE Cluster: bare',
        '',
        '## Basic Information',
        '',
        '- **Node Count**: 0',
        '- **Kubernetes Version**: unknown (master) / unknown (nodes)',
      ].join('\n'),
    );
  });

  it('should surface a remote 404 as an error result', async () => {
    const { dispatcher } = setup({ status: 404, statusText: 'Not Found' });

    const result = await dispatcher.invoke('get_cluster_info', args);

    expect(result).toEqual({
      content: [{ type: 'text', text: 'Error from Container API: 404 Not Found' }],
      isError: true,
    });
  });

  it('should render identical payloads identically', async () => {
    const { dispatcher } = setup(ok({ name: 'alpha', resourceLabels: { b: '2', a: '1' } }));

    const first = await dispatcher.invoke('get_cluster_info', args);
    const second = await dispatcher.invoke('get_cluster_info', args);

    expect(second).toEqual(first);
    expect(resultText(first)).toContain('- **b**: 2\n- **a**: 1');
  });
});

describe('list_node_pools', () => {
  const args = { project_id: 'demo', location: 'us-central1', cluster_name: 'alpha' };

  it('should describe each pool', async () => {
    const { dispatcher, requests } = setup(
      ok({
        nodePools: [
          {
            name: 'default-pool',
            status: 'RUNNING',
            version: '1.29.1',
            initialNodeCount: 3,
            config: {
              machineType: 'e2-standard-4',
              diskSizeGb: 100,
              oauthScopes: ['https://www.googleapis.com/auth/cloud-platform'],
              preemptible: false,
            },
            autoscaling: { enabled: true, minNodeCount: 1, maxNodeCount: 5 },
            management: { autoUpgrade: true, autoRepair: true },
          },
        ],
      }),
    );

    const result = await dispatcher.invoke('list_node_pools', args);

    expect(requests[0]?.url).toBe(
      'https://container.googleapis.com/v1/projects/demo/locations/us-central1/clusters/alpha/nodePools',
    );
    expect(resultText(result)).toBe(
      [
        '# Node Pools in Cluster alpha',
        '',
        '## 1. Node Pool: default-pool',
        '',
        '- **Status**: RUNNING',
        '- **Version**: 1.29.1',
        '- **Initial Node Count**: 3',
        '',
        '### Machine Configuration',
        '',
        '- **Machine Type**: e2-standard-4',
        '- **Disk Size**: 100 GB',
        '- **Preemptible**: No',
        '- **OAuth Scopes**:',
        '  - https://www.googleapis.com/auth/cloud-platform',
        '',
        '### Autoscaling',
        '',
        '- **Enabled**: Yes',
        '- **Min Nodes**: 1',
        '- **Max Nodes**: 5',
        '',
        '### Management',
        '',
        '- **Auto Upgrade**: Yes',
        '- **Auto Repair**: Yes',
      ].join('\n'),
    );
  });

  it('should report a cluster without pools', async () => {
    const { dispatcher } = setup(ok({}));

    const result = await dispatcher.invoke('list_node_pools', args);

    expect(resultText(result)).toBe('No node pools found in cluster alpha in location us-central1.');
  });
});
