export type ContainerNetwork = {
  name: string;
  ipAddress: string;
};

export type ContainerSummary = {
  id: string;
  names: string[];
  image: string;
  /** Runtime state as reported by the engine (created, running, exited, removing, ...). */
  state: string;
  labels: Record<string, string>;
  networks: ContainerNetwork[];
};

export type ContainerDetails = ContainerSummary & {
  running: boolean;
};

export type ListContainersOptions = {
  /** Label filters; a bare key matches containers carrying that label with any value. */
  labels?: string[];
};

export type CreateContainerOptions = {
  name: string;
  image: string;
  labels: Record<string, string>;
  networkMode: string;
  autoRemove?: boolean;
  capAdd?: string[];
  binds?: string[];
  env?: Record<string, string>;
};

export type ExecOptions = {
  env?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type ExecResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export type NetworkAddressBlock = {
  subnet?: string;
  ipRange?: string;
  gateway?: string;
};

export type NetworkDetails = {
  id: string;
  name: string;
  driver: string;
  addressBlocks: NetworkAddressBlock[];
};

export type ImageSummary = {
  id: string;
  repoTags: string[];
};
