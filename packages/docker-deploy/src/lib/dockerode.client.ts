import type { Duplex } from 'node:stream';

import Docker from 'dockerode';
import { z } from 'zod';
import {
  CancellationError,
  ResourceNotFoundError,
  TransientBackendError,
  errorMessage,
  type LoggerService,
} from '@dyncluster/deploy-core';

import type { DockerClientPort } from './dockerClient.port';
import { collectorSink, createUtf8Collector, readStreamToBuffer } from './containerStream.util';
import type {
  ContainerDetails,
  ContainerNetwork,
  ContainerSummary,
  CreateContainerOptions,
  ExecOptions,
  ExecResult,
  ImageSummary,
  ListContainersOptions,
  NetworkDetails,
} from './types';

const networkInspectSchema = z.object({
  Id: z.string(),
  Name: z.string(),
  Driver: z.string().default(''),
  IPAM: z
    .object({
      Config: z
        .array(
          z.object({
            Subnet: z.string().optional(),
            IPRange: z.string().optional(),
            Gateway: z.string().optional(),
          }),
        )
        .nullish(),
    })
    .nullish(),
});

type NetworkMap = Record<string, { IPAddress?: string } | undefined> | undefined;

export type DockerodeClientOptions = {
  socketPath?: string;
  logger: LoggerService;
  /** Injected engine client; tests and custom transports. */
  docker?: Docker;
};

/**
 * dockerode-backed {@link DockerClientPort}. Status codes from the engine are mapped into the
 * deploy error taxonomy here so callers never see raw modem errors.
 */
export class DockerodeClient implements DockerClientPort {
  private readonly docker: Docker;
  private readonly logger: LoggerService;

  constructor(options: DockerodeClientOptions) {
    this.docker = options.docker ?? new Docker(options.socketPath ? { socketPath: options.socketPath } : {});
    this.logger = options.logger.child({ component: 'DockerodeClient' });
  }

  async listContainers(options: ListContainersOptions = {}): Promise<ContainerSummary[]> {
    const filters = options.labels?.length ? { label: options.labels } : undefined;
    try {
      const items = await this.docker.listContainers({ all: true, ...(filters ? { filters } : {}) });
      return items.map((item) => ({
        id: item.Id,
        names: (item.Names ?? []).map((name) => name.replace(/^\//, '')),
        image: item.Image,
        state: item.State ?? '',
        labels: item.Labels ?? {},
        networks: mapNetworks(item.NetworkSettings?.Networks),
      }));
    } catch (err) {
      throw mapDockerError(err, 'list containers');
    }
  }

  async inspectContainer(containerId: string): Promise<ContainerDetails> {
    try {
      const info = await this.docker.getContainer(containerId).inspect();
      return {
        id: info.Id,
        names: [info.Name.replace(/^\//, '')],
        image: info.Config?.Image ?? '',
        state: info.State?.Status ?? '',
        running: info.State?.Running === true,
        labels: info.Config?.Labels ?? {},
        networks: mapNetworks(info.NetworkSettings?.Networks),
      };
    } catch (err) {
      throw mapDockerError(err, 'inspect container', containerId);
    }
  }

  async createContainer(options: CreateContainerOptions): Promise<string> {
    this.logger.info(`Creating container '${options.name}' from '${options.image}'`);
    try {
      const container = await this.docker.createContainer({
        name: options.name,
        Image: options.image,
        Labels: options.labels,
        Env: options.env ? Object.entries(options.env).map(([k, v]) => `${k}=${v}`) : undefined,
        Tty: false,
        HostConfig: {
          AutoRemove: options.autoRemove ?? false,
          NetworkMode: options.networkMode,
          CapAdd: options.capAdd,
          Binds: options.binds,
        },
      });
      return container.id;
    } catch (err) {
      throw mapDockerError(err, 'create container', options.name);
    }
  }

  async startContainer(containerId: string): Promise<void> {
    try {
      await this.docker.getContainer(containerId).start();
    } catch (err) {
      if (statusCodeOf(err) === 304) return;
      throw mapDockerError(err, 'start container', containerId);
    }
  }

  /** Stop a container by docker id (gracefully). */
  async stopContainer(containerId: string, timeoutSec = 10): Promise<void> {
    this.logger.info(`Stopping container cid=${shortId(containerId)} (timeout=${timeoutSec}s)`);
    try {
      await this.docker.getContainer(containerId).stop({ t: timeoutSec });
    } catch (err) {
      const sc = statusCodeOf(err);
      if (sc === 304) {
        this.logger.debug(`Container already stopped cid=${shortId(containerId)}`);
        return;
      }
      if (sc === 409) {
        this.logger.warn(`Container stop conflict (likely removing) cid=${shortId(containerId)}`);
        return;
      }
      throw mapDockerError(err, 'stop container', containerId);
    }
  }

  async removeContainer(containerId: string, options: { force?: boolean } = {}): Promise<void> {
    this.logger.info(`Removing container cid=${shortId(containerId)} force=${options.force ?? false}`);
    try {
      await this.docker.getContainer(containerId).remove({ force: options.force ?? false });
    } catch (err) {
      const sc = statusCodeOf(err);
      if (sc === 404) {
        this.logger.debug(`Container already removed cid=${shortId(containerId)}`);
        return;
      }
      if (sc === 409) {
        this.logger.warn(`Container removal already in progress cid=${shortId(containerId)}`);
        return;
      }
      throw mapDockerError(err, 'remove container', containerId);
    }
  }

  async execContainer(containerId: string, command: string[], options: ExecOptions = {}): Promise<ExecResult> {
    const container = this.docker.getContainer(containerId);
    this.logger.debug(`Exec in container cid=${shortId(containerId)}: ${command.join(' ')}`);

    let stream: Duplex;
    let exec: Docker.Exec;
    try {
      exec = await container.exec({
        Cmd: command,
        AttachStdout: true,
        AttachStderr: true,
        AttachStdin: false,
        Tty: false,
        Env: options.env ? Object.entries(options.env).map(([k, v]) => `${k}=${v}`) : undefined,
      });
      stream = await exec.start({ hijack: true, stdin: false });
    } catch (err) {
      throw mapDockerError(err, `exec '${command[0] ?? ''}'`, containerId);
    }

    const stdout = createUtf8Collector();
    const stderr = createUtf8Collector();
    this.docker.modem.demuxStream(stream, collectorSink(stdout), collectorSink(stderr));

    await this.waitForStreamEnd(stream, containerId, command, options);
    stdout.flush();
    stderr.flush();

    let exitCode = -1;
    try {
      const details = await exec.inspect();
      exitCode = details.ExitCode ?? -1;
    } catch (err) {
      throw mapDockerError(err, 'inspect exec', containerId);
    }
    this.logger.debug(`Exec finished cid=${shortId(containerId)} exitCode=${exitCode}`);
    return { stdout: stdout.getText(), stderr: stderr.getText(), exitCode };
  }

  async putArchive(containerId: string, data: Buffer, options: { path: string }): Promise<void> {
    try {
      await this.docker.getContainer(containerId).putArchive(data, { path: options.path });
    } catch (err) {
      throw mapDockerError(err, `put archive at ${options.path}`, containerId);
    }
  }

  async getArchive(containerId: string, options: { path: string }): Promise<Buffer | undefined> {
    const container = this.docker.getContainer(containerId);
    try {
      const stream = await container.getArchive({ path: options.path });
      return await readStreamToBuffer(stream);
    } catch (err) {
      if (statusCodeOf(err) !== 404) throw mapDockerError(err, `get archive of ${options.path}`, containerId);
    }
    // The engine answers 404 both for a missing container and a missing path.
    await this.inspectContainer(containerId);
    return undefined;
  }

  async inspectNetwork(name: string): Promise<NetworkDetails> {
    try {
      const raw: unknown = await this.docker.getNetwork(name).inspect();
      const info = networkInspectSchema.parse(raw);
      return {
        id: info.Id,
        name: info.Name,
        driver: info.Driver,
        addressBlocks: (info.IPAM?.Config ?? []).map((block) => ({
          subnet: block.Subnet || undefined,
          ipRange: block.IPRange || undefined,
          gateway: block.Gateway || undefined,
        })),
      };
    } catch (err) {
      throw mapDockerError(err, 'inspect network', name);
    }
  }

  async ensureNetwork(name: string): Promise<NetworkDetails> {
    try {
      return await this.inspectNetwork(name);
    } catch (err) {
      if (!(err instanceof ResourceNotFoundError)) throw err;
    }
    this.logger.info(`Creating network '${name}'`);
    try {
      await this.docker.createNetwork({ Name: name, Driver: 'bridge', CheckDuplicate: true });
    } catch (err) {
      if (statusCodeOf(err) !== 409) throw mapDockerError(err, 'create network', name);
    }
    return this.inspectNetwork(name);
  }

  /** Pulls the image unless it is already present locally. */
  async ensureImage(image: string): Promise<void> {
    try {
      await this.docker.getImage(image).inspect();
      this.logger.debug(`Image '${image}' already present`);
      return;
    } catch (err) {
      if (statusCodeOf(err) !== 404) throw mapDockerError(err, 'inspect image', image);
    }
    this.logger.info(`Image '${image}' not found locally. Pulling...`);
    try {
      const stream: NodeJS.ReadableStream = await this.docker.pull(image);
      await new Promise<void>((resolve, reject) => {
        this.docker.modem.followProgress(
          stream,
          (doneErr: Error | null) => (doneErr ? reject(doneErr) : resolve()),
          (event: { status?: string; id?: string }) => {
            if (event.status) this.logger.debug(event.id ? `${event.id}: ${event.status}` : event.status);
          },
        );
      });
    } catch (err) {
      throw mapDockerError(err, 'pull image', image);
    }
    this.logger.info(`Finished pulling image '${image}'`);
  }

  async listImages(): Promise<ImageSummary[]> {
    try {
      const images = await this.docker.listImages();
      return images.map((image) => ({ id: image.Id, repoTags: image.RepoTags ?? [] }));
    } catch (err) {
      throw mapDockerError(err, 'list images');
    }
  }

  private waitForStreamEnd(
    stream: NodeJS.ReadableStream,
    containerId: string,
    command: string[],
    options: ExecOptions,
  ): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let finished = false;
      const finish = (err?: Error) => {
        if (finished) return;
        finished = true;
        if (timer) clearTimeout(timer);
        options.signal?.removeEventListener('abort', onAbort);
        if (err) {
          destroyStream(stream);
          reject(err);
        } else {
          resolve();
        }
      };
      const onAbort = () =>
        finish(
          new CancellationError('aborted', `Exec '${command.join(' ')}' aborted`, {
            resourceId: containerId,
            cause: options.signal?.reason,
          }),
        );
      const timer =
        options.timeoutMs && options.timeoutMs > 0
          ? setTimeout(
              () =>
                finish(
                  new CancellationError('timeout', `Exec '${command.join(' ')}' exceeded ${options.timeoutMs}ms`, {
                    resourceId: containerId,
                  }),
                ),
              options.timeoutMs,
            )
          : null;

      if (options.signal?.aborted) return onAbort();
      options.signal?.addEventListener('abort', onAbort, { once: true });
      stream.on('end', () => finish());
      stream.on('close', () => finish());
      stream.on('error', (e: unknown) =>
        finish(new TransientBackendError(`Exec stream failed: ${errorMessage(e)}`, { resourceId: containerId, cause: e })),
      );
    });
  }
}

function mapNetworks(networks: NetworkMap): ContainerNetwork[] {
  if (!networks) return [];
  return Object.entries(networks).map(([name, info]) => ({ name, ipAddress: info?.IPAddress ?? '' }));
}

export function statusCodeOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('statusCode' in err)) return undefined;
  const sc = err.statusCode;
  return typeof sc === 'number' ? sc : undefined;
}

export function mapDockerError(err: unknown, action: string, resourceId?: string): Error {
  if (err instanceof ResourceNotFoundError || err instanceof TransientBackendError) return err;
  const statusCode = statusCodeOf(err);
  if (statusCode === 404) {
    return new ResourceNotFoundError(`Failed to ${action}: not found`, { resourceId, cause: err });
  }
  return new TransientBackendError(`Failed to ${action}: ${errorMessage(err)}`, { resourceId, statusCode, cause: err });
}

function destroyStream(stream: NodeJS.ReadableStream): void {
  if ('destroy' in stream && typeof stream.destroy === 'function') stream.destroy();
}

const shortId = (id: string) => id.substring(0, 12);
