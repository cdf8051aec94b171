import path from 'node:path';
import { extract, pack } from 'tar-stream';
import { ResourceNotFoundError, TransientBackendError } from '@dyncluster/deploy-core';

import type { DockerClientPort } from '../../src/lib/dockerClient.port';
import type {
  ContainerDetails,
  ContainerSummary,
  CreateContainerOptions,
  ExecResult,
  ImageSummary,
  ListContainersOptions,
  NetworkAddressBlock,
  NetworkDetails,
} from '../../src/lib/types';

type FilterRule = { source: string; target: string };

export type FakeContainer = {
  id: string;
  name: string;
  image: string;
  labels: Record<string, string>;
  running: boolean;
  autoRemove: boolean;
  ipAddress: string;
  capAdd: string[];
  files: Map<string, Buffer>;
  rules: FilterRule[];
  tools: Set<string>;
  removed: boolean;
  /** Listings that still show the container after removal. */
  lingering: number;
};

export const NETWORK = 'dyncluster_net';
export const GATEWAY = '172.28.0.1';
export const SUBNET = '172.28.0.0/16';

/**
 * In-process container engine: a per-container file tree fed by tar archives, a packet
 * filter table driven by exec'd rule commands, and removal that can lag behind the request.
 */
export class FakeDockerEngine implements DockerClientPort {
  readonly containers = new Map<string, FakeContainer>();
  readonly networks = new Map<string, NetworkDetails>();
  readonly execLog: Array<{ containerId: string; command: string[] }> = [];
  readonly pulled: string[] = [];
  readonly localImages: ImageSummary[] = [];

  /** Listings that keep showing a removed container. */
  removalLag = 0;
  /** Removed containers never leave the listing. */
  stuckRemoval = false;
  /** New containers do not show up in listings at all. */
  hideNewContainers = false;
  /** Whether new containers ship the packet filter tool. */
  toolsInImage = true;
  installSucceeds = true;
  installProvidesTool = true;
  listCalls = 0;

  private seq = 0;
  private nextHost = 2;
  private readonly hiddenIds = new Set<string>();

  constructor(addressBlocks: NetworkAddressBlock[] = [{ subnet: SUBNET, gateway: GATEWAY }]) {
    this.networks.set(NETWORK, { id: 'net-1', name: NETWORK, driver: 'bridge', addressBlocks });
  }

  async listContainers(options: ListContainersOptions = {}): Promise<ContainerSummary[]> {
    this.listCalls += 1;
    const out: ContainerSummary[] = [];
    for (const container of [...this.containers.values()]) {
      if (container.removed && !this.stuckRemoval) {
        if (container.lingering <= 0) {
          this.containers.delete(container.id);
          continue;
        }
        container.lingering -= 1;
      }
      if (this.hiddenIds.has(container.id)) continue;
      if (!matchesLabels(container.labels, options.labels ?? [])) continue;
      out.push(this.summary(container));
    }
    return out;
  }

  async inspectContainer(containerId: string): Promise<ContainerDetails> {
    const container = this.require(containerId);
    return { ...this.summary(container), running: container.running };
  }

  async createContainer(options: CreateContainerOptions): Promise<string> {
    if ([...this.containers.values()].some((c) => c.name === options.name && !c.removed)) {
      throw new TransientBackendError(`Failed to create container: name '${options.name}' in use`, { statusCode: 409 });
    }
    this.seq += 1;
    const id = `c${String(this.seq).padStart(11, '0')}`;
    this.containers.set(id, {
      id,
      name: options.name,
      image: options.image,
      labels: { ...options.labels },
      running: false,
      autoRemove: options.autoRemove ?? false,
      ipAddress: '',
      capAdd: options.capAdd ?? [],
      files: new Map(),
      rules: [],
      tools: new Set(this.toolsInImage ? ['iptables'] : []),
      removed: false,
      lingering: 0,
    });
    if (this.hideNewContainers) this.hiddenIds.add(id);
    return id;
  }

  /** Registers a container directly, bypassing create/start. */
  addContainer(options: { name: string; labels: Record<string, string>; running?: boolean }): FakeContainer {
    this.seq += 1;
    const id = `x${String(this.seq).padStart(11, '0')}`;
    const container: FakeContainer = {
      id,
      name: options.name,
      image: 'busybox:latest',
      labels: options.labels,
      running: options.running ?? true,
      autoRemove: false,
      ipAddress: options.running === false ? '' : this.allocateAddress(),
      capAdd: [],
      files: new Map(),
      rules: [],
      tools: new Set(['iptables']),
      removed: false,
      lingering: 0,
    };
    this.containers.set(id, container);
    return container;
  }

  async startContainer(containerId: string): Promise<void> {
    const container = this.require(containerId);
    container.running = true;
    if (!container.ipAddress) container.ipAddress = this.allocateAddress();
  }

  async stopContainer(containerId: string): Promise<void> {
    const container = this.require(containerId);
    container.running = false;
    if (container.autoRemove) this.markRemoved(container);
  }

  async removeContainer(containerId: string): Promise<void> {
    const container = this.containers.get(containerId);
    if (!container || container.removed) return;
    container.running = false;
    this.markRemoved(container);
  }

  async execContainer(containerId: string, command: string[]): Promise<ExecResult> {
    const container = this.require(containerId);
    if (!container.running) {
      throw new TransientBackendError('Failed to exec: container is not running', { resourceId: containerId });
    }
    this.execLog.push({ containerId, command });
    const [tool, ...args] = command;

    if (tool === 'iptables') {
      if (!container.tools.has('iptables')) return { stdout: '', stderr: 'sh: iptables: not found', exitCode: 127 };
      return runFilterCommand(container, args);
    }
    if (tool === 'apt-get') {
      if (!this.installSucceeds) return { stdout: '', stderr: 'E: Unable to fetch', exitCode: 100 };
      if (args.includes('install') && this.installProvidesTool) {
        for (const pkg of args.slice(args.indexOf('install') + 1)) container.tools.add(pkg);
      }
      return { stdout: '', stderr: '', exitCode: 0 };
    }
    return { stdout: '', stderr: `sh: ${tool ?? ''}: not found`, exitCode: 127 };
  }

  async putArchive(containerId: string, data: Buffer, options: { path: string }): Promise<void> {
    const container = this.require(containerId);
    for (const [name, content] of await readAllEntries(data)) {
      container.files.set(path.posix.join(options.path, name), content);
    }
  }

  async getArchive(containerId: string, options: { path: string }): Promise<Buffer | undefined> {
    const container = this.require(containerId);
    const root = options.path.replace(/\/+$/, '');
    const base = path.posix.basename(root);
    const entries: Array<[string, Buffer]> = [];
    for (const [file, content] of container.files) {
      if (file === root) entries.push([base, content]);
      else if (file.startsWith(`${root}/`)) entries.push([`${base}/${file.slice(root.length + 1)}`, content]);
    }
    if (entries.length === 0) return undefined;
    return packEntries(entries, base);
  }

  async inspectNetwork(name: string): Promise<NetworkDetails> {
    const network = this.networks.get(name);
    if (!network) throw new ResourceNotFoundError('Failed to inspect network: not found', { resourceId: name });
    return network;
  }

  async ensureNetwork(name: string): Promise<NetworkDetails> {
    if (!this.networks.has(name)) {
      this.networks.set(name, { id: `net-${name}`, name, driver: 'bridge', addressBlocks: [{ subnet: SUBNET, gateway: GATEWAY }] });
    }
    return this.inspectNetwork(name);
  }

  async ensureImage(image: string): Promise<void> {
    if (this.localImages.some((i) => i.repoTags.includes(image))) return;
    this.pulled.push(image);
    this.localImages.push({ id: `sha256:${this.localImages.length + 1}`, repoTags: [image] });
  }

  async listImages(): Promise<ImageSummary[]> {
    return this.localImages;
  }

  /** Verdict of the container's INPUT chain for a packet from `sourceIp`; empty chain accepts. */
  evaluatePacket(containerId: string, sourceIp: string): string {
    const container = this.require(containerId);
    const rule = container.rules.find((r) => cidrContains(r.source, sourceIp));
    return rule?.target ?? 'ACCEPT';
  }

  byNodeId(nodeId: string): FakeContainer {
    const found = [...this.containers.values()].find((c) => c.labels['dyncluster/node_id'] === nodeId);
    if (!found) throw new Error(`no container for node ${nodeId}`);
    return found;
  }

  private markRemoved(container: FakeContainer): void {
    if (container.removed) return;
    container.removed = true;
    container.lingering = this.removalLag;
  }

  private require(containerId: string): FakeContainer {
    const container =
      this.containers.get(containerId) ?? [...this.containers.values()].find((c) => c.name === containerId);
    if (!container || (container.removed && container.lingering <= 0 && !this.stuckRemoval)) {
      throw new ResourceNotFoundError('Failed to inspect container: not found', { resourceId: containerId });
    }
    return container;
  }

  private summary(container: FakeContainer): ContainerSummary {
    return {
      id: container.id,
      names: [container.name],
      image: container.image,
      state: container.removed ? 'removing' : container.running ? 'running' : 'created',
      labels: { ...container.labels },
      networks: [{ name: NETWORK, ipAddress: container.ipAddress }],
    };
  }

  private allocateAddress(): string {
    const host = this.nextHost;
    this.nextHost += 1;
    return `172.28.0.${host}`;
  }
}

function runFilterCommand(container: FakeContainer, args: string[]): ExecResult {
  if (args[0] === '-F') {
    container.rules = [];
    return { stdout: '', stderr: '', exitCode: 0 };
  }
  if (args[0] === '-S') {
    const lines = ['-P INPUT ACCEPT', ...container.rules.map((r) => `-A INPUT -s ${r.source} -j ${r.target}`)];
    return { stdout: `${lines.join('\n')}\n`, stderr: '', exitCode: 0 };
  }
  if (args[0] === '-I' && args[1] === 'INPUT' && args[2] === '-s' && args[4] === '-j' && args[3] && args[5]) {
    container.rules.unshift({ source: args[3], target: args[5] });
    return { stdout: '', stderr: '', exitCode: 0 };
  }
  return { stdout: '', stderr: `iptables: bad arguments ${args.join(' ')}`, exitCode: 2 };
}

function matchesLabels(labels: Record<string, string>, filters: string[]): boolean {
  return filters.every((filter) => {
    const eq = filter.indexOf('=');
    if (eq < 0) return filter in labels;
    return labels[filter.slice(0, eq)] === filter.slice(eq + 1);
  });
}

function ipToInt(ip: string): number {
  return ip.split('.').reduce((acc, octet) => (acc << 8) + Number(octet), 0) >>> 0;
}

export function cidrContains(cidr: string, ip: string): boolean {
  const [network, bitsText] = cidr.split('/');
  const bits = bitsText === undefined ? 32 : Number(bitsText);
  const mask = bits === 0 ? 0 : (~0 << (32 - bits)) >>> 0;
  return (ipToInt(network) & mask) === (ipToInt(ip) & mask);
}

export function readAllEntries(archive: Buffer): Promise<Map<string, Buffer>> {
  return new Promise((resolve, reject) => {
    const files = new Map<string, Buffer>();
    const ex = extract();
    ex.on('entry', (header, stream, next) => {
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
      stream.on('end', () => {
        if (header.type === 'file') files.set(header.name, Buffer.concat(chunks));
        next();
      });
      stream.on('error', reject);
    });
    ex.on('finish', () => resolve(files));
    ex.on('error', reject);
    ex.end(archive);
  });
}

async function packEntries(entries: Array<[string, Buffer]>, directory: string): Promise<Buffer> {
  const tar = pack();
  tar.entry({ name: `${directory}/`, type: 'directory', mode: 0o755 });
  for (const [name, content] of entries) tar.entry({ name, size: content.length, mode: 0o644 }, content);
  tar.finalize();
  const chunks: Buffer[] = [];
  for await (const chunk of tar) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  return Buffer.concat(chunks);
}
