export type PageRequest = {
  /** 1-based. */
  page?: number;
  perPage?: number;
  sortBy?: string;
  sortDirection?: 'asc' | 'desc';
};

export type CreateProjectRequest = {
  name: string;
};

export type UpdateProjectRequest = {
  name: string;
};

export type ClusterSpec = {
  provider: string;
  compute: string;
  count: number;
  services: string[];
  disk: { type: string; sizeInGb: number; iops?: number };
  diskAutoScaling: { enabled: boolean };
};

export type CreateClusterRequest = {
  name: string;
  description?: string;
  projectId: string;
  provider: string;
  region: string;
  cidr: string;
  plan: string;
  server: string;
  singleAZ: boolean;
  timezone: string;
  specs: ClusterSpec[];
};

export type UpdateClusterMetaRequest = {
  name: string;
  description: string;
};

export type UpdateClusterSpecsRequest = {
  specs: Array<{
    count: number;
    compute: { type: string };
    services: Array<{ type: string }>;
    disk: { type: string; sizeInGb: number; iops?: number };
    diskAutoScaling: { enabled: boolean };
  }>;
};

export type AllowListChange = {
  cidr: string;
  comment: string;
  /** RFC 3339; omitted for permanent entries. */
  expiresAt?: string;
};

export type UpdateAllowListRequest = {
  create: AllowListChange[];
  /** Ids of entries to delete. */
  delete: string[];
};

export type PrivateEndpointLinkRequest = {
  vpcId: string;
  /** Space separated subnet ids. */
  subnetIds: string;
};

export type CreateDatabaseUserRequest = {
  name: string;
  password: string;
  /** Keyed by `read`/`write`; no bucket list means every bucket. */
  permissions: Record<string, { buckets?: string[] }>;
};

export type CreateCloudBucketRequest = {
  name: string;
  type: 'couchbase' | 'ephemeral';
  memoryAllocationInMb: number;
  replicas: number;
  durabilityLevel: string;
  bucketConflictResolution: 'seqno' | 'lww';
  storageBackend: 'couchstore' | 'magma';
  flush: boolean;
};
