import { v4 as uuidv4 } from 'uuid';
import {
  CancellationError,
  ConsistencyError,
  ResourceNotFoundError,
  errorMessage,
  pollUntil,
  type LoggerService,
} from '@dyncluster/deploy-core';

import type { DockerClientPort } from '../lib/dockerClient.port';
import { NodeCatalog, type CatalogEntry } from './node.catalog';
import { buildNodeLabels, nodeContainerName } from './nodeLabels';
import type { NodeStateStore } from './nodeState.store';
import type { TrafficController } from './trafficControl';

export const MANAGEMENT_PORT = 8091;

export type NodeInfo = {
  nodeId: string;
  clusterId: string;
  resourceId: string;
  name: string;
  creator: string;
  purpose: string;
  initialServerVersion: string;
  ipAddress: string;
  /** `null` when the persisted state could not be read. */
  expiry: Date | null;
};

export type DeployNodeOptions = {
  clusterId: string;
  purpose: string;
  /** Lifetime from now; persisted as an absolute expiry. */
  expiryMs: number;
  image: string;
  serverVersion: string;
  name?: string;
  signal?: AbortSignal;
};

export interface ReadinessProbe {
  /** Resolves once the node's management endpoint answers; bounded by the probe itself. */
  waitForReady(endpoint: string, options?: { signal?: AbortSignal; resourceId?: string }): Promise<void>;
}

type NodePhase = 'creating' | 'starting' | 'writing-state' | 'resolving-address' | 'waiting-ready' | 'ready';

export type NodeControllerOptions = {
  docker: DockerClientPort;
  stateStore: NodeStateStore;
  trafficController: TrafficController;
  readiness: ReadinessProbe;
  networkName: string;
  creator: string;
  logger: LoggerService;
  removal?: { intervalMs: number; timeoutMs: number };
  generateId?: () => string;
  now?: () => number;
};

/**
 * Single-node lifecycle on the container runtime: deploy, enumerate, remove and partition.
 * Nodes are found by their labels only; nothing is tracked in memory.
 */
export class NodeController {
  private readonly docker: DockerClientPort;
  private readonly catalog: NodeCatalog;
  private readonly stateStore: NodeStateStore;
  private readonly trafficController: TrafficController;
  private readonly readiness: ReadinessProbe;
  private readonly networkName: string;
  private readonly creator: string;
  private readonly logger: LoggerService;
  private readonly removal: { intervalMs: number; timeoutMs: number };
  private readonly generateId: () => string;
  private readonly now: () => number;

  constructor(options: NodeControllerOptions) {
    this.docker = options.docker;
    this.catalog = new NodeCatalog(options.docker, options.networkName);
    this.stateStore = options.stateStore;
    this.trafficController = options.trafficController;
    this.readiness = options.readiness;
    this.networkName = options.networkName;
    this.creator = options.creator;
    this.logger = options.logger.child({ component: 'NodeController' });
    this.removal = options.removal ?? { intervalMs: 100, timeoutMs: 60_000 };
    this.generateId = options.generateId ?? uuidv4;
    this.now = options.now ?? Date.now;
  }

  /** Managed nodes, each with its persisted expiry; unreadable state degrades to `expiry: null`. */
  async listNodes(filter: { clusterId?: string } = {}): Promise<NodeInfo[]> {
    const entries = await this.catalog.list(filter);
    return Promise.all(entries.map((entry) => this.withExpiry(entry)));
  }

  async deployNode(options: DeployNodeOptions): Promise<NodeInfo> {
    const { signal } = options;
    const nodeId = this.generateId();
    const name = options.name ?? nodeId;
    const log = this.logger.child({ nodeId, clusterId: options.clusterId });
    const phase = (p: NodePhase, extra: Record<string, unknown> = {}) => log.info(`Node ${p}`, { phase: p, ...extra });

    throwIfAborted(signal, nodeId);
    phase('creating', { image: options.image });
    const resourceId = await this.docker.createContainer({
      name: nodeContainerName(nodeId),
      image: options.image,
      labels: buildNodeLabels({
        clusterId: options.clusterId,
        nodeId,
        name,
        creator: this.creator,
        purpose: options.purpose,
        initialServerVersion: options.serverVersion,
      }),
      networkMode: this.networkName,
      autoRemove: true,
      capAdd: ['NET_ADMIN'],
      binds: ['/etc/localtime:/etc/localtime:ro'],
    });

    throwIfAborted(signal, nodeId);
    phase('starting', { resourceId });
    await this.docker.startContainer(resourceId);

    throwIfAborted(signal, nodeId);
    phase('writing-state');
    const expiry = new Date(this.now() + options.expiryMs);
    await this.stateStore.writeState(resourceId, { expiry });

    throwIfAborted(signal, nodeId);
    phase('resolving-address');
    const entry = (await this.catalog.list({ clusterId: options.clusterId })).find((e) => e.nodeId === nodeId);
    if (!entry) {
      throw new ConsistencyError('Node not visible in listing right after start', { resourceId: nodeId });
    }
    if (!entry.ipAddress) {
      throw new ConsistencyError(`Node has no address on network '${this.networkName}'`, { resourceId: nodeId });
    }

    phase('waiting-ready', { ipAddress: entry.ipAddress });
    await this.readiness.waitForReady(managementEndpoint(entry.ipAddress), { signal, resourceId: nodeId });

    phase('ready', { ipAddress: entry.ipAddress });
    return { ...toNodeInfo(entry), expiry };
  }

  /** Idempotent: a node that is already gone counts as removed. */
  async removeNode(nodeId: string, options: { signal?: AbortSignal } = {}): Promise<void> {
    const log = this.logger.child({ nodeId });
    const entry = await this.catalog.find(nodeId);
    if (!entry) {
      log.debug('Node already removed');
      return;
    }

    try {
      await this.docker.stopContainer(entry.resourceId);
    } catch (err) {
      if (!(err instanceof ResourceNotFoundError)) throw err;
      log.debug('Node container vanished while stopping');
    }
    try {
      await this.docker.removeContainer(entry.resourceId, { force: true });
    } catch (err) {
      // Containers run with auto-remove; the engine may beat us to it.
      log.debug('Explicit removal failed; waiting for the engine', { error: errorMessage(err) });
    }

    await pollUntil(
      async () => ((await this.catalog.find(nodeId)) ? undefined : true),
      {
        intervalMs: this.removal.intervalMs,
        timeoutMs: this.removal.timeoutMs,
        signal: options.signal,
        description: `node ${nodeId} to disappear`,
        resourceId: nodeId,
      },
    );
    log.info('Node removed');
  }

  async setTrafficControl(nodeId: string, blocked: boolean, options: { signal?: AbortSignal } = {}): Promise<void> {
    const entry = await this.catalog.find(nodeId);
    if (!entry) throw new ResourceNotFoundError('Unknown node', { resourceId: nodeId });
    await this.trafficController.setTrafficControl(entry.resourceId, blocked, options);
  }

  private async withExpiry(entry: CatalogEntry): Promise<NodeInfo> {
    try {
      const state = await this.stateStore.readState(entry.resourceId);
      return { ...toNodeInfo(entry), expiry: state?.expiry ?? null };
    } catch (err) {
      this.logger.debug('Node state unavailable', { nodeId: entry.nodeId, error: errorMessage(err) });
      return { ...toNodeInfo(entry), expiry: null };
    }
  }
}

export const managementEndpoint = (ipAddress: string) => `http://${ipAddress}:${MANAGEMENT_PORT}`;

function toNodeInfo(entry: CatalogEntry): NodeInfo {
  return {
    nodeId: entry.nodeId,
    clusterId: entry.clusterId,
    resourceId: entry.resourceId,
    name: entry.name,
    creator: entry.creator,
    purpose: entry.purpose,
    initialServerVersion: entry.initialServerVersion,
    ipAddress: entry.ipAddress,
    expiry: null,
  };
}

function throwIfAborted(signal: AbortSignal | undefined, nodeId: string): void {
  if (!signal?.aborted) return;
  throw new CancellationError('aborted', 'Node deployment cancelled', { resourceId: nodeId, cause: signal.reason });
}
