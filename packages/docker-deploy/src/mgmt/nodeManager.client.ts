import { fetch as undiciFetch, type Response } from 'undici';
import { z } from 'zod';
import {
  CancellationError,
  ConfigurationError,
  ResourceNotFoundError,
  TransientBackendError,
  errorMessage,
  pollUntil,
  type BucketInfo,
  type CreateBucketOptions,
  type CreateUserOptions,
  type LoggerService,
  type ScopeInfo,
  type UserInfo,
} from '@dyncluster/deploy-core';

export const QUERY_PORT = 8093;
export const DEFAULT_BUCKET_RAM_QUOTA_MB = 100;

const usersSchema = z.array(
  z.object({
    id: z.string(),
    roles: z.array(z.object({ role: z.string(), bucket_name: z.string().optional() })).default([]),
  }),
);
const bucketsSchema = z.array(z.object({ name: z.string() }));
const scopesSchema = z.object({
  scopes: z.array(
    z.object({
      name: z.string(),
      collections: z.array(z.object({ name: z.string() })).default([]),
    }),
  ),
});
const poolSchema = z.object({
  nodes: z.array(z.object({ otpNode: z.string(), hostname: z.string() })).default([]),
});
const rebalanceProgressSchema = z.object({ status: z.string() });

export type WaitOptions = {
  signal?: AbortSignal;
  timeoutMs: number;
  intervalMs: number;
};

export type InitClusterOptions = {
  hostname: string;
  services: string[];
  memoryQuotaMb: number;
  indexerStorageMode: 'plasma' | 'forestdb';
};

/** Operations the cluster layer performs through one node's management interface. */
export interface NodeManagementApi {
  waitForOnline(options: WaitOptions & { resourceId?: string }): Promise<void>;
  initCluster(options: InitClusterOptions): Promise<void>;
  addNode(hostname: string, services: string[]): Promise<void>;
  /** Rebalances over all known nodes, ejecting those at `ejectHostnames`, and waits for completion. */
  rebalance(ejectHostnames: string[], options: WaitOptions): Promise<void>;
  listUsers(): Promise<UserInfo[]>;
  createUser(user: CreateUserOptions): Promise<void>;
  deleteUser(username: string): Promise<void>;
  listBuckets(): Promise<BucketInfo[]>;
  createBucket(bucket: CreateBucketOptions): Promise<void>;
  deleteBucket(name: string): Promise<void>;
  listScopes(bucket: string): Promise<ScopeInfo[]>;
  createScope(bucket: string, scope: string): Promise<void>;
  createCollection(bucket: string, scope: string, collection: string): Promise<void>;
  deleteScope(bucket: string, scope: string): Promise<void>;
  deleteCollection(bucket: string, scope: string, collection: string): Promise<void>;
  getCertificate(): Promise<string>;
  executeQuery(statement: string): Promise<string>;
}

export type NodeManagementClientConfig = {
  /** Management endpoint of one node, `http://<ip>:8091`. */
  endpoint: string;
  username: string;
  password: string;
  logger: LoggerService;
  requestTimeoutMs?: number;
  fetchImpl?: typeof undiciFetch;
};

type RequestOptions = {
  method: 'GET' | 'POST' | 'PUT' | 'DELETE';
  path: string;
  form?: Record<string, string>;
  /** Overrides the management endpoint (query service lives on its own port). */
  baseUrl?: URL;
  auth?: boolean;
  /** Caller cancellation; aborts the request in flight. */
  signal?: AbortSignal;
};

/** REST client for a single node's management interface (form-encoded requests, JSON replies). */
export class NodeManagementClient implements NodeManagementApi {
  private readonly baseUrl: URL;
  private readonly username: string;
  private readonly password: string;
  private readonly authHeader: string;
  private readonly logger: LoggerService;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: typeof undiciFetch;

  constructor(config: NodeManagementClientConfig) {
    this.baseUrl = new URL(config.endpoint);
    this.username = config.username;
    this.password = config.password;
    this.authHeader = `Basic ${Buffer.from(`${config.username}:${config.password}`).toString('base64')}`;
    this.logger = config.logger.child({ component: 'NodeManagementClient', endpoint: this.baseUrl.origin });
    this.requestTimeoutMs = config.requestTimeoutMs ?? 30_000;
    this.fetchImpl = config.fetchImpl ?? undiciFetch;
  }

  async waitForOnline(options: WaitOptions & { resourceId?: string }): Promise<void> {
    await pollUntil(
      async () => {
        try {
          const response = await this.fetchImpl(new URL('/pools', this.baseUrl), {
            method: 'GET',
            signal: this.requestSignal(options.signal, Math.min(this.requestTimeoutMs, options.timeoutMs)),
          });
          await response.body?.cancel();
          return response.ok ? true : undefined;
        } catch (err) {
          this.logger.debug('Management endpoint not reachable yet', { error: errorMessage(err) });
          return undefined;
        }
      },
      {
        intervalMs: options.intervalMs,
        timeoutMs: options.timeoutMs,
        signal: options.signal,
        description: `management endpoint ${this.baseUrl.origin}`,
        resourceId: options.resourceId,
      },
    );
  }

  async initCluster(options: InitClusterOptions): Promise<void> {
    await this.send({
      method: 'POST',
      path: '/clusterInit',
      auth: false,
      form: {
        hostname: options.hostname,
        services: options.services.join(','),
        username: this.username,
        password: this.password,
        port: 'SAME',
        memoryQuota: String(options.memoryQuotaMb),
        indexerStorageMode: options.indexerStorageMode,
      },
    });
  }

  async addNode(hostname: string, services: string[]): Promise<void> {
    await this.send({
      method: 'POST',
      path: '/controller/addNode',
      form: { hostname, user: this.username, password: this.password, services: services.join(',') },
    });
  }

  async rebalance(ejectHostnames: string[], options: WaitOptions): Promise<void> {
    const { signal } = options;
    const pool = parseReply(poolSchema, await this.json({ method: 'GET', path: '/pools/default', signal }));
    const ejected = pool.nodes
      .filter((node) => ejectHostnames.includes(node.hostname.replace(/:\d+$/, '')))
      .map((node) => node.otpNode);
    await this.send({
      method: 'POST',
      path: '/controller/rebalance',
      form: {
        knownNodes: pool.nodes.map((node) => node.otpNode).join(','),
        ejectedNodes: ejected.join(','),
      },
      signal,
    });
    await pollUntil(
      async () => {
        const reply = await this.json({ method: 'GET', path: '/pools/default/rebalanceProgress', signal });
        const progress = parseReply(rebalanceProgressSchema, reply);
        return progress.status === 'none' ? true : undefined;
      },
      { ...options, description: 'rebalance to finish' },
    );
  }

  async listUsers(): Promise<UserInfo[]> {
    const users = parseReply(usersSchema, await this.json({ method: 'GET', path: '/settings/rbac/users/local' }));
    return users.map((user) => {
      const roles = new Set(user.roles.map((r) => r.role));
      const admin = roles.has('admin');
      return {
        username: user.id,
        canRead: admin || roles.has('data_reader'),
        canWrite: admin || roles.has('data_writer'),
      };
    });
  }

  async createUser(user: CreateUserOptions): Promise<void> {
    const roles: string[] = [];
    if (user.canRead) roles.push('data_reader[*]');
    if (user.canWrite) roles.push('data_writer[*]');
    if (roles.length === 0) {
      throw new ConfigurationError(`User '${user.username}' must be allowed to read or write`);
    }
    await this.send({
      method: 'PUT',
      path: `/settings/rbac/users/local/${encodeURIComponent(user.username)}`,
      form: { password: user.password, roles: roles.join(',') },
    });
  }

  async deleteUser(username: string): Promise<void> {
    await this.send({ method: 'DELETE', path: `/settings/rbac/users/local/${encodeURIComponent(username)}` });
  }

  async listBuckets(): Promise<BucketInfo[]> {
    const buckets = parseReply(bucketsSchema, await this.json({ method: 'GET', path: '/pools/default/buckets' }));
    return buckets.map((bucket) => ({ name: bucket.name }));
  }

  async createBucket(bucket: CreateBucketOptions): Promise<void> {
    await this.send({
      method: 'POST',
      path: '/pools/default/buckets',
      form: {
        name: bucket.name,
        bucketType: 'couchbase',
        ramQuota: String(bucket.ramQuotaMb ?? DEFAULT_BUCKET_RAM_QUOTA_MB),
      },
    });
  }

  async deleteBucket(name: string): Promise<void> {
    await this.send({ method: 'DELETE', path: bucketPath(name) });
  }

  async listScopes(bucket: string): Promise<ScopeInfo[]> {
    const parsed = parseReply(scopesSchema, await this.json({ method: 'GET', path: `${bucketPath(bucket)}/scopes` }));
    return parsed.scopes.map((scope) => ({
      name: scope.name,
      collections: scope.collections.map((c) => ({ name: c.name })),
    }));
  }

  async createScope(bucket: string, scope: string): Promise<void> {
    await this.send({ method: 'POST', path: `${bucketPath(bucket)}/scopes`, form: { name: scope } });
  }

  async createCollection(bucket: string, scope: string, collection: string): Promise<void> {
    await this.send({
      method: 'POST',
      path: `${bucketPath(bucket)}/scopes/${encodeURIComponent(scope)}/collections`,
      form: { name: collection },
    });
  }

  async deleteScope(bucket: string, scope: string): Promise<void> {
    await this.send({ method: 'DELETE', path: `${bucketPath(bucket)}/scopes/${encodeURIComponent(scope)}` });
  }

  async deleteCollection(bucket: string, scope: string, collection: string): Promise<void> {
    await this.send({
      method: 'DELETE',
      path: `${bucketPath(bucket)}/scopes/${encodeURIComponent(scope)}/collections/${encodeURIComponent(collection)}`,
    });
  }

  async getCertificate(): Promise<string> {
    const response = await this.send({ method: 'GET', path: '/pools/default/certificate' });
    return response.text();
  }

  async executeQuery(statement: string): Promise<string> {
    const queryUrl = new URL(this.baseUrl);
    queryUrl.port = String(QUERY_PORT);
    const response = await this.send({
      method: 'POST',
      path: '/query/service',
      baseUrl: queryUrl,
      form: { statement },
    });
    return response.text();
  }

  private requestSignal(caller: AbortSignal | undefined, timeoutMs: number): AbortSignal {
    const timeout = AbortSignal.timeout(timeoutMs);
    return caller ? AbortSignal.any([caller, timeout]) : timeout;
  }

  private async json(options: RequestOptions): Promise<unknown> {
    const response = await this.send(options);
    try {
      return await response.json();
    } catch (err) {
      throw new TransientBackendError(`${options.method} ${options.path} returned invalid JSON`, { cause: err });
    }
  }

  private async send(options: RequestOptions): Promise<Response> {
    const url = new URL(options.path, options.baseUrl ?? this.baseUrl);
    const headers: Record<string, string> = {};
    if (options.auth !== false) headers.authorization = this.authHeader;
    let body: string | undefined;
    if (options.form) {
      headers['content-type'] = 'application/x-www-form-urlencoded';
      body = new URLSearchParams(options.form).toString();
    }

    this.logger.debug('Management request', { method: options.method, path: options.path });
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: options.method,
        headers,
        body,
        signal: this.requestSignal(options.signal, this.requestTimeoutMs),
      });
    } catch (err) {
      if (options.signal?.aborted) {
        throw new CancellationError('aborted', `${options.method} ${url.pathname} cancelled (${url.origin})`, {
          cause: options.signal.reason,
        });
      }
      throw new TransientBackendError(
        `${options.method} ${url.pathname} failed (${url.origin}): ${errorMessage(err)}`,
        { cause: err },
      );
    }
    if (response.ok) return response;

    const text = await response.text().catch((err: unknown) => `<unreadable body: ${errorMessage(err)}>`);
    const message = `${options.method} ${url.pathname} returned ${response.status}: ${text.trim().slice(0, 500)}`;
    if (response.status === 404) throw new ResourceNotFoundError(message);
    throw new TransientBackendError(message, { statusCode: response.status });
  }
}

function parseReply<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new TransientBackendError(`Unexpected management reply: ${parsed.error.issues[0]?.message ?? 'invalid'}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

const bucketPath = (name: string) => `/pools/default/buckets/${encodeURIComponent(name)}`;
