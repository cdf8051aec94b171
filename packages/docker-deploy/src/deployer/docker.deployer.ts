import { v4 as uuidv4 } from 'uuid';
import {
  ConfigurationError,
  Deployer,
  ResourceNotFoundError,
  errorMessage,
  type BucketInfo,
  type ClusterDefinition,
  type ClusterInfo,
  type ConnectInfo,
  type CreateBucketOptions,
  type CreateUserOptions,
  type LoggerService,
  type NodeGroupDefinition,
  type OperationOptions,
  type ScopeInfo,
  type UserInfo,
} from '@dyncluster/deploy-core';

import type { DockerClientPort } from '../lib/dockerClient.port';
import type { ImageProvider } from '../images/image.provider';
import type { ManagementClientFactory } from '../mgmt/readiness.probe';
import type { NodeManagementApi, WaitOptions } from '../mgmt/nodeManager.client';
import { managementEndpoint, type NodeController, type NodeInfo } from '../nodes/node.controller';

export const DEFAULT_MEMORY_QUOTA_MB = 1024;
const DEFAULT_EXPIRY_MS = 3_600_000;
const DEFAULT_SERVICES: NodeGroupDefinition['services'] = ['kv', 'n1ql', 'index'];

export type DockerDeployerOptions = {
  docker: DockerClientPort;
  nodes: NodeController;
  images: ImageProvider;
  managementClientFor: ManagementClientFactory;
  networkName: string;
  /** Bounds for cluster-wide waits such as rebalancing. */
  waits: { timeoutMs: number; intervalMs: number };
  logger: LoggerService;
  generateClusterId?: () => string;
  now?: () => number;
};

type PlannedNode = {
  group: NodeGroupDefinition;
  image: string;
};

/** Clusters as groups of labelled node containers on one shared network. */
export class DockerDeployer extends Deployer {
  readonly backend = 'docker' as const;

  private readonly docker: DockerClientPort;
  private readonly nodes: NodeController;
  private readonly images: ImageProvider;
  private readonly managementClientFor: ManagementClientFactory;
  private readonly networkName: string;
  private readonly waits: { timeoutMs: number; intervalMs: number };
  private readonly logger: LoggerService;
  private readonly generateClusterId: () => string;
  private readonly now: () => number;

  constructor(options: DockerDeployerOptions) {
    super();
    this.docker = options.docker;
    this.nodes = options.nodes;
    this.images = options.images;
    this.managementClientFor = options.managementClientFor;
    this.networkName = options.networkName;
    this.waits = options.waits;
    this.logger = options.logger.child({ component: 'DockerDeployer' });
    this.generateClusterId = options.generateClusterId ?? uuidv4;
    this.now = options.now ?? Date.now;
  }

  async listClusters(): Promise<ClusterInfo[]> {
    const byCluster = new Map<string, NodeInfo[]>();
    for (const node of await this.nodes.listNodes()) {
      const group = byCluster.get(node.clusterId) ?? [];
      group.push(node);
      byCluster.set(node.clusterId, group);
    }
    return [...byCluster.entries()].map(([clusterId, nodes]) => toClusterInfo(clusterId, sortNodes(nodes)));
  }

  async newCluster(def: ClusterDefinition, options: OperationOptions = {}): Promise<ClusterInfo> {
    const clusterId = this.generateClusterId();
    const log = this.logger.child({ clusterId });
    await this.docker.ensureNetwork(this.networkName);

    const plan: PlannedNode[] = [];
    for (const group of def.nodeGroups) {
      const image = await this.images.getImage(group);
      for (let i = 0; i < group.count; i += 1) plan.push({ group, image });
    }
    log.info('Creating cluster', { purpose: def.purpose, nodes: plan.length });

    const deployed: NodeInfo[] = [];
    try {
      for (const [index, planned] of plan.entries()) {
        deployed.push(await this.deployPlanned(clusterId, def, planned, index + 1, options.signal));
      }

      const [first, ...rest] = deployed;
      const mgmt = this.mgmtFor(first);
      await mgmt.initCluster({
        hostname: first.ipAddress,
        services: plan[0].group.services,
        memoryQuotaMb: DEFAULT_MEMORY_QUOTA_MB,
        indexerStorageMode: plan[0].group.communityEdition ? 'forestdb' : 'plasma',
      });
      for (const [index, node] of rest.entries()) {
        await mgmt.addNode(node.ipAddress, plan[index + 1].group.services);
      }
      if (rest.length > 0) await mgmt.rebalance([], this.waitOptions(options));
    } catch (err) {
      log.error('Cluster creation failed; removing deployed nodes', { error: errorMessage(err) });
      await this.removeQuietly(deployed);
      throw err;
    }

    log.info('Cluster ready', { nodes: deployed.map((n) => n.ipAddress) });
    return toClusterInfo(clusterId, deployed);
  }

  /**
   * Rebuilt from node labels: versions and counts survive, edition and service layout do not.
   * Expiry is the time left on the earliest-expiring node, one hour when none is known.
   */
  async getDefinition(clusterId: string): Promise<ClusterDefinition> {
    const nodes = await this.requireNodes(clusterId);
    const counts = new Map<string, number>();
    for (const node of nodes) counts.set(node.initialServerVersion, (counts.get(node.initialServerVersion) ?? 0) + 1);

    const expiry = earliestExpiry(nodes);
    return {
      purpose: nodes[0].purpose,
      expiry: expiry ? Math.max(0, expiry.getTime() - this.now()) : DEFAULT_EXPIRY_MS,
      nodeGroups: [...counts.entries()].map(([version, count]) => ({
        count,
        version,
        buildNo: 0,
        communityEdition: false,
        serverless: false,
        columnar: false,
        services: [...DEFAULT_SERVICES],
      })),
    };
  }

  /**
   * Scales each server version to the count the definition asks for. Introducing a version
   * the cluster does not run yet is an upgrade and is refused.
   */
  async modifyCluster(clusterId: string, def: ClusterDefinition, options: OperationOptions = {}): Promise<void> {
    const nodes = await this.requireNodes(clusterId);
    const log = this.logger.child({ clusterId });

    const desired = new Map<string, number>();
    for (const group of def.nodeGroups) desired.set(group.version, (desired.get(group.version) ?? 0) + group.count);
    const current = new Map<string, NodeInfo[]>();
    for (const node of nodes) current.set(node.initialServerVersion, [...(current.get(node.initialServerVersion) ?? []), node]);

    for (const version of desired.keys()) {
      if (!current.has(version)) {
        throw new ConfigurationError(`Cannot change server versions of an existing cluster (new version ${version})`, {
          resourceId: clusterId,
        });
      }
    }

    const toRemove: NodeInfo[] = [];
    for (const [version, versionNodes] of current) {
      const excess = versionNodes.length - (desired.get(version) ?? 0);
      if (excess > 0) toRemove.push(...versionNodes.slice(versionNodes.length - excess));
    }
    const toAdd: NodeGroupDefinition[] = [];
    for (const [version, count] of desired) {
      const missing = count - (current.get(version)?.length ?? 0);
      const group = def.nodeGroups.find((g) => g.version === version);
      if (group) for (let i = 0; i < missing; i += 1) toAdd.push(group);
    }

    if (toAdd.length === 0 && toRemove.length === 0) {
      log.info('Cluster already matches definition');
      return;
    }

    const survivor = nodes.find((node) => !toRemove.includes(node));
    if (!survivor) throw new ConfigurationError('Definition would remove every node', { resourceId: clusterId });
    const mgmt = this.mgmtFor(survivor);

    let nextIndex = nextNodeIndex(nodes);
    for (const group of toAdd) {
      const image = await this.images.getImage(group);
      const node = await this.deployPlanned(clusterId, def, { group, image }, nextIndex, options.signal);
      nextIndex += 1;
      await mgmt.addNode(node.ipAddress, group.services);
    }

    log.info('Rebalancing cluster', { added: toAdd.length, removed: toRemove.map((n) => n.nodeId) });
    await mgmt.rebalance(
      toRemove.map((n) => n.ipAddress),
      this.waitOptions(options),
    );
    for (const node of toRemove) await this.nodes.removeNode(node.nodeId, options);
  }

  async removeCluster(clusterId: string, options: OperationOptions = {}): Promise<void> {
    const nodes = await this.requireNodes(clusterId);
    for (const node of nodes) await this.nodes.removeNode(node.nodeId, options);
    this.logger.info('Cluster removed', { clusterId, nodes: nodes.length });
  }

  async removeAll(options: OperationOptions = {}): Promise<void> {
    for (const node of await this.nodes.listNodes()) await this.nodes.removeNode(node.nodeId, options);
  }

  /** Removes nodes past their expiry. Nodes whose expiry cannot be read are left in place. */
  async cleanup(options: OperationOptions = {}): Promise<void> {
    const now = this.now();
    for (const node of await this.nodes.listNodes()) {
      if (node.expiry === null) {
        this.logger.warn('Skipping node with unknown expiry', { nodeId: node.nodeId, clusterId: node.clusterId });
        continue;
      }
      if (node.expiry.getTime() > now) continue;
      this.logger.info('Removing expired node', { nodeId: node.nodeId, expiry: node.expiry });
      await this.nodes.removeNode(node.nodeId, options);
    }
  }

  async getConnectInfo(clusterId: string): Promise<ConnectInfo> {
    const nodes = await this.requireNodes(clusterId);
    return {
      connStr: `couchbase://${nodes.map((n) => n.ipAddress).join(',')}`,
      mgmt: managementEndpoint(nodes[0].ipAddress),
    };
  }

  async listUsers(clusterId: string): Promise<UserInfo[]> {
    return (await this.clusterMgmt(clusterId)).listUsers();
  }

  async createUser(clusterId: string, user: CreateUserOptions): Promise<void> {
    await (await this.clusterMgmt(clusterId)).createUser(user);
  }

  async deleteUser(clusterId: string, username: string): Promise<void> {
    await (await this.clusterMgmt(clusterId)).deleteUser(username);
  }

  async listBuckets(clusterId: string): Promise<BucketInfo[]> {
    return (await this.clusterMgmt(clusterId)).listBuckets();
  }

  async createBucket(clusterId: string, bucket: CreateBucketOptions): Promise<void> {
    await (await this.clusterMgmt(clusterId)).createBucket(bucket);
  }

  async deleteBucket(clusterId: string, bucketName: string): Promise<void> {
    await (await this.clusterMgmt(clusterId)).deleteBucket(bucketName);
  }

  async listCollections(clusterId: string, bucketName: string): Promise<ScopeInfo[]> {
    return (await this.clusterMgmt(clusterId)).listScopes(bucketName);
  }

  async createScope(clusterId: string, bucketName: string, scopeName: string): Promise<void> {
    await (await this.clusterMgmt(clusterId)).createScope(bucketName, scopeName);
  }

  async createCollection(clusterId: string, bucketName: string, scopeName: string, collectionName: string): Promise<void> {
    await (await this.clusterMgmt(clusterId)).createCollection(bucketName, scopeName, collectionName);
  }

  async deleteScope(clusterId: string, bucketName: string, scopeName: string): Promise<void> {
    await (await this.clusterMgmt(clusterId)).deleteScope(bucketName, scopeName);
  }

  async deleteCollection(clusterId: string, bucketName: string, scopeName: string, collectionName: string): Promise<void> {
    await (await this.clusterMgmt(clusterId)).deleteCollection(bucketName, scopeName, collectionName);
  }

  async getCertificate(clusterId: string): Promise<string> {
    return (await this.clusterMgmt(clusterId)).getCertificate();
  }

  async executeQuery(clusterId: string, query: string): Promise<string> {
    return (await this.clusterMgmt(clusterId)).executeQuery(query);
  }

  /** Partitions one node of a cluster from its peers, or lifts the partition. */
  async setTrafficControl(
    clusterId: string,
    nodeId: string,
    blocked: boolean,
    options: OperationOptions = {},
  ): Promise<void> {
    const nodes = await this.requireNodes(clusterId);
    if (!nodes.some((node) => node.nodeId === nodeId)) {
      throw new ResourceNotFoundError(`Node is not part of cluster ${clusterId}`, { resourceId: nodeId });
    }
    await this.nodes.setTrafficControl(nodeId, blocked, options);
  }

  private deployPlanned(
    clusterId: string,
    def: ClusterDefinition,
    planned: PlannedNode,
    index: number,
    signal?: AbortSignal,
  ): Promise<NodeInfo> {
    return this.nodes.deployNode({
      clusterId,
      purpose: def.purpose,
      expiryMs: def.expiry,
      image: planned.image,
      serverVersion: planned.group.version,
      name: `node-${index}`,
      signal,
    });
  }

  private async requireNodes(clusterId: string): Promise<NodeInfo[]> {
    const nodes = sortNodes(await this.nodes.listNodes({ clusterId }));
    if (nodes.length === 0) throw new ResourceNotFoundError('Unknown cluster', { resourceId: clusterId });
    return nodes;
  }

  private async clusterMgmt(clusterId: string): Promise<NodeManagementApi> {
    const [first] = await this.requireNodes(clusterId);
    return this.mgmtFor(first);
  }

  private mgmtFor(node: NodeInfo): NodeManagementApi {
    return this.managementClientFor(managementEndpoint(node.ipAddress));
  }

  private waitOptions(options: OperationOptions): WaitOptions {
    return { ...this.waits, signal: options.signal };
  }

  private async removeQuietly(nodes: NodeInfo[]): Promise<void> {
    for (const node of nodes) {
      try {
        await this.nodes.removeNode(node.nodeId);
      } catch (err) {
        this.logger.warn('Rollback removal failed', { nodeId: node.nodeId, error: errorMessage(err) });
      }
    }
  }
}

function sortNodes(nodes: NodeInfo[]): NodeInfo[] {
  return [...nodes].sort((a, b) => a.name.localeCompare(b.name, undefined, { numeric: true }) || a.nodeId.localeCompare(b.nodeId));
}

function earliestExpiry(nodes: NodeInfo[]): Date | null {
  let earliest: Date | null = null;
  for (const node of nodes) {
    if (node.expiry && (!earliest || node.expiry < earliest)) earliest = node.expiry;
  }
  return earliest;
}

function nextNodeIndex(nodes: NodeInfo[]): number {
  let max = 0;
  for (const node of nodes) {
    const match = /^node-(\d+)$/.exec(node.name);
    if (match) max = Math.max(max, Number(match[1]));
  }
  return Math.max(max, nodes.length) + 1;
}

function toClusterInfo(clusterId: string, nodes: NodeInfo[]): ClusterInfo {
  return {
    id: clusterId,
    purpose: nodes[0]?.purpose ?? '',
    expiry: earliestExpiry(nodes),
    state: 'ready',
    nodes: nodes.map((node) => ({
      id: node.nodeId,
      resourceId: node.resourceId,
      name: node.name,
      ipAddress: node.ipAddress,
    })),
  };
}
