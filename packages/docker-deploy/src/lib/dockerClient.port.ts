import type {
  ContainerDetails,
  ContainerSummary,
  CreateContainerOptions,
  ExecOptions,
  ExecResult,
  ImageSummary,
  ListContainersOptions,
  NetworkDetails,
} from './types';

/**
 * The slice of the container runtime the node lifecycle needs.
 *
 * Missing containers surface as `ResourceNotFoundError`; any other failed call as
 * `TransientBackendError`. Stopping a stopped container and removing a missing one succeed.
 */
export interface DockerClientPort {
  listContainers(options?: ListContainersOptions): Promise<ContainerSummary[]>;
  inspectContainer(containerId: string): Promise<ContainerDetails>;
  createContainer(options: CreateContainerOptions): Promise<string>;
  startContainer(containerId: string): Promise<void>;
  stopContainer(containerId: string, timeoutSec?: number): Promise<void>;
  removeContainer(containerId: string, options?: { force?: boolean }): Promise<void>;
  execContainer(containerId: string, command: string[], options?: ExecOptions): Promise<ExecResult>;
  /** Extracts a tar archive into `path` inside the container. */
  putArchive(containerId: string, data: Buffer, options: { path: string }): Promise<void>;
  /** Tar archive of `path`, or `undefined` when the path does not exist in a reachable container. */
  getArchive(containerId: string, options: { path: string }): Promise<Buffer | undefined>;
  inspectNetwork(name: string): Promise<NetworkDetails>;
  ensureNetwork(name: string): Promise<NetworkDetails>;
  ensureImage(image: string): Promise<void>;
  listImages(): Promise<ImageSummary[]>;
}
