import type { DockerClientPort } from '../lib/dockerClient.port';
import type { ContainerSummary } from '../lib/types';
import { nodeLabelFilter, parseNodeLabels, type NodeIdentity } from './nodeLabels';

export type CatalogEntry = NodeIdentity & {
  resourceId: string;
  ipAddress: string;
  state: string;
};

/**
 * Label-based view over the container runtime: every container carrying the full identity
 * label set is one managed node.
 */
export class NodeCatalog {
  constructor(
    private readonly docker: DockerClientPort,
    private readonly networkName: string,
  ) {}

  async list(filter: { clusterId?: string } = {}): Promise<CatalogEntry[]> {
    const containers = await this.docker.listContainers({ labels: nodeLabelFilter(filter.clusterId) });
    const entries: CatalogEntry[] = [];
    for (const container of containers) {
      const identity = parseNodeLabels(container.labels);
      if (!identity) continue;
      if (filter.clusterId && identity.clusterId !== filter.clusterId) continue;
      entries.push({
        ...identity,
        resourceId: container.id,
        ipAddress: this.addressOf(container),
        state: container.state,
      });
    }
    return entries;
  }

  async find(nodeId: string): Promise<CatalogEntry | undefined> {
    const entries = await this.list();
    return entries.find((entry) => entry.nodeId === nodeId);
  }

  private addressOf(container: ContainerSummary): string {
    const onNetwork = container.networks.find((n) => n.name === this.networkName && n.ipAddress);
    if (onNetwork) return onNetwork.ipAddress;
    return container.networks.find((n) => n.ipAddress)?.ipAddress ?? '';
  }
}
