import { describe, expect, it } from 'vitest';

import { buildNodeLabels, nodeContainerName, nodeLabelFilter, parseNodeLabels } from '../src/nodes/nodeLabels';

const identity = {
  clusterId: 'cluster-a',
  nodeId: 'node-1',
  name: 'node-1',
  creator: 'tester',
  purpose: 'failover drill',
  initialServerVersion: '7.2.4',
};

describe('node labels', () => {
  it('round-trips the identity', () => {
    expect(parseNodeLabels(buildNodeLabels(identity))).toEqual(identity);
  });

  it('requires cluster and node ids', () => {
    expect(parseNodeLabels({ 'dyncluster/node_id': 'node-1' })).toBeNull();
    expect(parseNodeLabels({ 'dyncluster/cluster_id': 'cluster-a' })).toBeNull();
    expect(parseNodeLabels(undefined)).toBeNull();
  });

  it('defaults descriptive labels to empty strings', () => {
    expect(parseNodeLabels({ 'dyncluster/cluster_id': 'c', 'dyncluster/node_id': 'n' })).toEqual({
      clusterId: 'c',
      nodeId: 'n',
      name: '',
      creator: '',
      purpose: '',
      initialServerVersion: '',
    });
  });

  it('builds engine filters', () => {
    expect(nodeLabelFilter()).toEqual(['dyncluster/node_id', 'dyncluster/cluster_id']);
    expect(nodeLabelFilter('cluster-a')).toEqual(['dyncluster/node_id', 'dyncluster/cluster_id=cluster-a']);
  });

  it('names node containers after the node id', () => {
    expect(nodeContainerName('abc')).toBe('dynnode-abc');
  });
});
