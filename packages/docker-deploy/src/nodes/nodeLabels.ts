export const LABEL_PREFIX = 'dyncluster/';

export const NODE_LABELS = {
  clusterId: `${LABEL_PREFIX}cluster_id`,
  nodeId: `${LABEL_PREFIX}node_id`,
  nodeName: `${LABEL_PREFIX}node_name`,
  creator: `${LABEL_PREFIX}creator`,
  purpose: `${LABEL_PREFIX}purpose`,
  initialServerVersion: `${LABEL_PREFIX}initial_server_version`,
} as const;

/** Identity every managed node carries as resource labels. */
export type NodeIdentity = {
  clusterId: string;
  nodeId: string;
  name: string;
  creator: string;
  purpose: string;
  initialServerVersion: string;
};

export function buildNodeLabels(identity: NodeIdentity): Record<string, string> {
  return {
    [NODE_LABELS.clusterId]: identity.clusterId,
    [NODE_LABELS.nodeId]: identity.nodeId,
    [NODE_LABELS.nodeName]: identity.name,
    [NODE_LABELS.creator]: identity.creator,
    [NODE_LABELS.purpose]: identity.purpose,
    [NODE_LABELS.initialServerVersion]: identity.initialServerVersion,
  };
}

/**
 * Reads the identity back from resource labels. Resources without a cluster or node id are
 * not managed nodes and yield `null`; the descriptive labels default to empty strings.
 */
export function parseNodeLabels(labels: Record<string, string> | null | undefined): NodeIdentity | null {
  if (!labels) return null;
  const clusterId = labels[NODE_LABELS.clusterId];
  const nodeId = labels[NODE_LABELS.nodeId];
  if (!clusterId || !nodeId) return null;
  return {
    clusterId,
    nodeId,
    name: labels[NODE_LABELS.nodeName] ?? '',
    creator: labels[NODE_LABELS.creator] ?? '',
    purpose: labels[NODE_LABELS.purpose] ?? '',
    initialServerVersion: labels[NODE_LABELS.initialServerVersion] ?? '',
  };
}

/** Engine-side label filters narrowing a listing to managed nodes, optionally of one cluster. */
export function nodeLabelFilter(clusterId?: string): string[] {
  const filters: string[] = [NODE_LABELS.nodeId];
  filters.push(clusterId ? `${NODE_LABELS.clusterId}=${clusterId}` : NODE_LABELS.clusterId);
  return filters;
}

export const nodeContainerName = (nodeId: string) => `dynnode-${nodeId}`;
