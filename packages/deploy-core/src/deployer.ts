import type { ClusterDefinition } from './clusterDef';

export type DeployerBackend = 'docker' | 'orchestrated' | 'cloud';

export interface ClusterNodeInfo {
  readonly id: string;
  /** Backend handle of the node (container id, pod name, ...). */
  readonly resourceId: string;
  readonly name: string;
  readonly ipAddress: string;
}

export interface ClusterInfo {
  readonly id: string;
  readonly purpose: string;
  /** `null` when no node carries a known expiry. */
  readonly expiry: Date | null;
  readonly state: string;
  readonly nodes: readonly ClusterNodeInfo[];
}

export type ConnectInfo = {
  connStr: string;
  mgmt: string;
};

export type UserInfo = {
  username: string;
  canRead: boolean;
  canWrite: boolean;
};

export type CreateUserOptions = {
  username: string;
  password: string;
  canRead: boolean;
  canWrite: boolean;
};

export type BucketInfo = {
  name: string;
};

export type CreateBucketOptions = {
  name: string;
  ramQuotaMb?: number;
};

export type CollectionInfo = {
  name: string;
};

export type ScopeInfo = {
  name: string;
  collections: CollectionInfo[];
};

export type OperationOptions = {
  signal?: AbortSignal;
};

/**
 * Backend-agnostic cluster surface. Each backend (containers, orchestrated, managed cloud)
 * extends this class so callers stay unaware of where clusters actually run.
 */
export abstract class Deployer {
  abstract readonly backend: DeployerBackend;

  abstract listClusters(options?: OperationOptions): Promise<ClusterInfo[]>;
  abstract newCluster(def: ClusterDefinition, options?: OperationOptions): Promise<ClusterInfo>;
  abstract getDefinition(clusterId: string, options?: OperationOptions): Promise<ClusterDefinition>;
  abstract modifyCluster(clusterId: string, def: ClusterDefinition, options?: OperationOptions): Promise<void>;
  abstract removeCluster(clusterId: string, options?: OperationOptions): Promise<void>;
  abstract removeAll(options?: OperationOptions): Promise<void>;
  /** Sweeps resources whose lifetime has run out. */
  abstract cleanup(options?: OperationOptions): Promise<void>;
  abstract getConnectInfo(clusterId: string, options?: OperationOptions): Promise<ConnectInfo>;

  abstract listUsers(clusterId: string, options?: OperationOptions): Promise<UserInfo[]>;
  abstract createUser(clusterId: string, user: CreateUserOptions, options?: OperationOptions): Promise<void>;
  abstract deleteUser(clusterId: string, username: string, options?: OperationOptions): Promise<void>;

  abstract listBuckets(clusterId: string, options?: OperationOptions): Promise<BucketInfo[]>;
  abstract createBucket(clusterId: string, bucket: CreateBucketOptions, options?: OperationOptions): Promise<void>;
  abstract deleteBucket(clusterId: string, bucketName: string, options?: OperationOptions): Promise<void>;

  abstract listCollections(clusterId: string, bucketName: string, options?: OperationOptions): Promise<ScopeInfo[]>;
  abstract createScope(
    clusterId: string,
    bucketName: string,
    scopeName: string,
    options?: OperationOptions,
  ): Promise<void>;
  abstract createCollection(
    clusterId: string,
    bucketName: string,
    scopeName: string,
    collectionName: string,
    options?: OperationOptions,
  ): Promise<void>;
  abstract deleteScope(
    clusterId: string,
    bucketName: string,
    scopeName: string,
    options?: OperationOptions,
  ): Promise<void>;
  abstract deleteCollection(
    clusterId: string,
    bucketName: string,
    scopeName: string,
    collectionName: string,
    options?: OperationOptions,
  ): Promise<void>;

  abstract getCertificate(clusterId: string, options?: OperationOptions): Promise<string>;
  abstract executeQuery(clusterId: string, query: string, options?: OperationOptions): Promise<string>;
}
