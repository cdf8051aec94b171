import { PassThrough, type Writable } from 'node:stream';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { LoggerService, ResourceNotFoundError, TransientBackendError } from '@dyncluster/deploy-core';

import { DockerodeClient } from '../src/lib/dockerode.client';

const mocks = vi.hoisted(() => ({
  listContainers: vi.fn(),
  getContainer: vi.fn(),
  getNetwork: vi.fn(),
  createNetwork: vi.fn(),
  demuxStream: vi.fn(),
}));

vi.mock('dockerode', () => {
  class MockDocker {
    modem = { demuxStream: mocks.demuxStream, followProgress: vi.fn() };
    listContainers = mocks.listContainers;
    getContainer = mocks.getContainer;
    getNetwork = mocks.getNetwork;
    createNetwork = mocks.createNetwork;
  }
  return { default: MockDocker };
});

const logger = new LoggerService({ level: 'error', sink: () => {} });
const engineError = (statusCode: number, message = `HTTP ${statusCode}`) => Object.assign(new Error(message), { statusCode });

describe('DockerodeClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('maps container listings and forwards label filters', async () => {
    mocks.listContainers.mockResolvedValue([
      {
        Id: 'abc123',
        Names: ['/dynnode-n1'],
        Image: 'couchbase/server:enterprise-7.2.4',
        State: 'running',
        Labels: { 'dyncluster/node_id': 'n1' },
        NetworkSettings: { Networks: { dyncluster_net: { IPAddress: '172.28.0.2' } } },
      },
    ]);
    const client = new DockerodeClient({ logger });

    const listed = await client.listContainers({ labels: ['dyncluster/node_id'] });

    expect(mocks.listContainers).toHaveBeenCalledWith({ all: true, filters: { label: ['dyncluster/node_id'] } });
    expect(listed).toEqual([
      {
        id: 'abc123',
        names: ['dynnode-n1'],
        image: 'couchbase/server:enterprise-7.2.4',
        state: 'running',
        labels: { 'dyncluster/node_id': 'n1' },
        networks: [{ name: 'dyncluster_net', ipAddress: '172.28.0.2' }],
      },
    ]);
  });

  it('treats stopping a stopped container as success', async () => {
    mocks.getContainer.mockReturnValue({ stop: vi.fn().mockRejectedValue(engineError(304)) });
    const client = new DockerodeClient({ logger });

    await expect(client.stopContainer('abc123')).resolves.toBeUndefined();
  });

  it('reports stopping a missing container as not found', async () => {
    mocks.getContainer.mockReturnValue({ stop: vi.fn().mockRejectedValue(engineError(404)) });
    const client = new DockerodeClient({ logger });

    await expect(client.stopContainer('abc123')).rejects.toBeInstanceOf(ResourceNotFoundError);
  });

  it('treats removing a missing container as success', async () => {
    mocks.getContainer.mockReturnValue({ remove: vi.fn().mockRejectedValue(engineError(404)) });
    const client = new DockerodeClient({ logger });

    await expect(client.removeContainer('abc123', { force: true })).resolves.toBeUndefined();
  });

  it('wraps other engine failures as transient', async () => {
    mocks.getContainer.mockReturnValue({ remove: vi.fn().mockRejectedValue(engineError(500, 'driver failed')) });
    const client = new DockerodeClient({ logger });

    await expect(client.removeContainer('abc123')).rejects.toMatchObject({
      name: 'TransientBackendError',
      statusCode: 500,
      resourceId: 'abc123',
    });
  });

  it('distinguishes a missing archive path from a missing container', async () => {
    const inspect = vi.fn().mockResolvedValue({
      Id: 'abc123',
      Name: '/dynnode-n1',
      Config: { Image: 'img', Labels: {} },
      State: { Status: 'running', Running: true },
      NetworkSettings: { Networks: {} },
    });
    mocks.getContainer.mockReturnValue({ getArchive: vi.fn().mockRejectedValue(engineError(404)), inspect });
    const client = new DockerodeClient({ logger });

    await expect(client.getArchive('abc123', { path: '/var/dyncluster' })).resolves.toBeUndefined();

    inspect.mockRejectedValue(engineError(404));
    await expect(client.getArchive('abc123', { path: '/var/dyncluster' })).rejects.toBeInstanceOf(
      ResourceNotFoundError,
    );
  });

  it('collects exec output and exit code', async () => {
    const stream = new PassThrough();
    const exec = {
      start: vi.fn().mockResolvedValue(stream),
      inspect: vi.fn().mockResolvedValue({ ExitCode: 127 }),
    };
    mocks.getContainer.mockReturnValue({ exec: vi.fn().mockResolvedValue(exec) });
    mocks.demuxStream.mockImplementation((source: PassThrough, out: Writable, err: Writable) => {
      out.write('rules\n');
      err.write('iptables: not found\n');
      source.resume();
      setImmediate(() => source.end());
    });
    const client = new DockerodeClient({ logger });

    const result = await client.execContainer('abc123', ['iptables', '-S']);

    expect(result).toEqual({ stdout: 'rules\n', stderr: 'iptables: not found\n', exitCode: 127 });
  });

  it('reads the IPAM blocks of a network', async () => {
    mocks.getNetwork.mockReturnValue({
      inspect: vi.fn().mockResolvedValue({
        Id: 'net1',
        Name: 'dyncluster_net',
        Driver: 'bridge',
        IPAM: { Config: [{ Subnet: '172.28.0.0/16', Gateway: '172.28.0.1' }, { Subnet: 'fd00::/64', IPRange: '' }] },
      }),
    });
    const client = new DockerodeClient({ logger });

    expect(await client.inspectNetwork('dyncluster_net')).toEqual({
      id: 'net1',
      name: 'dyncluster_net',
      driver: 'bridge',
      addressBlocks: [
        { subnet: '172.28.0.0/16', ipRange: undefined, gateway: '172.28.0.1' },
        { subnet: 'fd00::/64', ipRange: undefined, gateway: undefined },
      ],
    });
  });

  it('creates the network when it does not exist', async () => {
    const inspect = vi
      .fn()
      .mockRejectedValueOnce(engineError(404))
      .mockResolvedValue({ Id: 'net2', Name: 'fresh_net', Driver: 'bridge', IPAM: { Config: [] } });
    mocks.getNetwork.mockReturnValue({ inspect });
    mocks.createNetwork.mockResolvedValue({});
    const client = new DockerodeClient({ logger });

    const network = await client.ensureNetwork('fresh_net');

    expect(mocks.createNetwork).toHaveBeenCalledWith({ Name: 'fresh_net', Driver: 'bridge', CheckDuplicate: true });
    expect(network).toEqual({ id: 'net2', name: 'fresh_net', driver: 'bridge', addressBlocks: [] });
  });

  it('surfaces listing failures as transient', async () => {
    mocks.listContainers.mockRejectedValue(new Error('connect ENOENT /var/run/docker.sock'));
    const client = new DockerodeClient({ logger });

    await expect(client.listContainers()).rejects.toBeInstanceOf(TransientBackendError);
  });
});
