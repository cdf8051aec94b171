import { setTimeout as delay } from 'node:timers/promises';
import { z } from 'zod';
import { fetch as undiciFetch, type Response } from 'undici';
import { CancellationError, TransientBackendError, errorMessage, type LoggerService } from '@dyncluster/deploy-core';

import { basicAuthorization, signRequest, type ControlPlaneCredentials } from './credentials';
import { ControlPlaneRequestError, buildErrorFromResponse } from './errors';
import {
  allowListEntrySchema,
  bucketListSchema,
  clusterJobSchema,
  clusterSchema,
  createdSchema,
  databaseUserSchema,
  deploymentOptionsSchema,
  linkCommandSchema,
  pagedOf,
  pagedResourcesOf,
  privateEndpointDetailsSchema,
  privateEndpointLinkSchema,
  privateEndpointSchema,
  projectSchema,
  resourceOf,
  sessionSchema,
  trustedCaSchema,
} from './responses';
import type {
  CreateCloudBucketRequest,
  CreateClusterRequest,
  CreateDatabaseUserRequest,
  CreateProjectRequest,
  PageRequest,
  PrivateEndpointLinkRequest,
  UpdateAllowListRequest,
  UpdateClusterMetaRequest,
  UpdateClusterSpecsRequest,
  UpdateProjectRequest,
} from './requests';

export const DEFAULT_MAX_RETRIES = 10;
const SESSION_MAX_RETRIES = 3;

/** 500ms, then 100ms more per retry already taken. */
export const defaultRetryDelayMs = (retryNum: number) => 500 + 100 * retryNum;

export type ControlPlaneClientOptions = {
  endpoint: string;
  credentials: ControlPlaneCredentials;
  logger: LoggerService;
  fetchImpl?: typeof undiciFetch;
  requestTimeoutMs?: number;
  /** Retries for calls that allow them (reads). Mutations never retry. */
  maxRetries?: number;
  retryDelayMs?: (retryNum: number) => number;
  now?: () => number;
};

type Method = 'GET' | 'POST' | 'PUT' | 'DELETE';

type RequestOptions = {
  method: Method;
  path: string;
  query?: PageRequest | Record<string, string | number | undefined>;
  body?: unknown;
  maxRetries?: number;
  signal?: AbortSignal;
};

type CallOptions = { signal?: AbortSignal };

export type ClusterRef = {
  tenantId: string;
  projectId: string;
  clusterId: string;
};

const projectsPage = pagedResourcesOf(projectSchema);
const clustersPage = pagedResourcesOf(clusterSchema);
const jobsPage = pagedResourcesOf(clusterJobSchema);
const allowListPage = pagedResourcesOf(allowListEntrySchema);
const usersPage = pagedResourcesOf(databaseUserSchema);
const endpointLinksPage = pagedOf(privateEndpointLinkSchema);

/**
 * Client for the managed cloud control plane. Requests are JSON, authenticated per
 * {@link signRequest}; session tokens for basic credentials are fetched lazily and refreshed
 * once when a call is rejected as `Unauthorized`.
 */
export class ControlPlaneClient {
  private readonly endpoint: string;
  private readonly credentials: ControlPlaneCredentials;
  private readonly logger: LoggerService;
  private readonly fetchImpl: typeof undiciFetch;
  private readonly requestTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: (retryNum: number) => number;
  private readonly now: () => number;
  private sessionToken?: string;

  constructor(options: ControlPlaneClientOptions) {
    this.endpoint = options.endpoint.replace(/\/+$/, '');
    this.credentials = options.credentials;
    this.logger = options.logger.child({ component: 'ControlPlaneClient' });
    this.fetchImpl = options.fetchImpl ?? undiciFetch;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? defaultRetryDelayMs;
    this.now = options.now ?? Date.now;
  }

  getEndpoint(): string {
    return this.endpoint;
  }

  async listProjects(tenantId: string, page: PageRequest = {}, options: CallOptions = {}) {
    return this.sendJson(projectsPage, {
      method: 'GET',
      path: `/v2/organizations/${seg(tenantId)}/projects`,
      query: page,
      ...options,
    });
  }

  async createProject(tenantId: string, req: CreateProjectRequest, options: CallOptions = {}) {
    return this.sendJson(createdSchema, {
      method: 'POST',
      path: `/v2/organizations/${seg(tenantId)}/projects`,
      body: req,
      ...options,
    });
  }

  async updateProject(
    tenantId: string,
    projectId: string,
    req: UpdateProjectRequest,
    options: CallOptions = {},
  ): Promise<void> {
    await this.send({
      method: 'PUT',
      path: `/v2/organizations/${seg(tenantId)}/projects/${seg(projectId)}`,
      body: req,
      ...options,
    });
  }

  async deleteProject(tenantId: string, projectId: string, options: CallOptions = {}): Promise<void> {
    await this.send({
      method: 'DELETE',
      path: `/v2/organizations/${seg(tenantId)}/projects/${seg(projectId)}`,
      ...options,
    });
  }

  async listClusters(tenantId: string, page: PageRequest = {}, options: CallOptions = {}) {
    return this.sendJson(clustersPage, {
      method: 'GET',
      path: `/v2/organizations/${seg(tenantId)}/clusters`,
      query: page,
      ...options,
    });
  }

  async createCluster(tenantId: string, req: CreateClusterRequest, options: CallOptions = {}) {
    return this.sendJson(createdSchema, {
      method: 'POST',
      path: `/v2/organizations/${seg(tenantId)}/clusters`,
      body: req,
      ...options,
    });
  }

  async deleteCluster(ref: ClusterRef, options: CallOptions = {}): Promise<void> {
    await this.send({ method: 'DELETE', path: clusterPath(ref), ...options });
  }

  async updateClusterMeta(ref: ClusterRef, req: UpdateClusterMetaRequest, options: CallOptions = {}): Promise<void> {
    await this.send({ method: 'POST', path: `${clusterPath(ref)}/meta`, body: req, ...options });
  }

  async updateClusterSpecs(ref: ClusterRef, req: UpdateClusterSpecsRequest, options: CallOptions = {}): Promise<void> {
    await this.send({ method: 'POST', path: `${clusterPath(ref)}/specs`, body: req, ...options });
  }

  async listClusterJobs(ref: ClusterRef, options: CallOptions = {}) {
    return this.sendJson(jobsPage, { method: 'GET', path: `${clusterPath(ref)}/jobs`, ...options });
  }

  async getDeploymentOptions(tenantId: string, provider: string, options: CallOptions = {}) {
    return this.sendJson(deploymentOptionsSchema, {
      method: 'GET',
      path: `/v2/organizations/${seg(tenantId)}/clusters/deployment-options`,
      query: { provider },
      ...options,
    });
  }

  async listAllowListEntries(ref: ClusterRef, page: PageRequest = {}, options: CallOptions = {}) {
    return this.sendJson(allowListPage, {
      method: 'GET',
      path: `${clusterPath(ref)}/allowlists`,
      query: page,
      ...options,
    });
  }

  async updateAllowListEntries(ref: ClusterRef, req: UpdateAllowListRequest, options: CallOptions = {}): Promise<void> {
    await this.send({ method: 'POST', path: `${clusterPath(ref)}/allowlists-bulk`, body: req, ...options });
  }

  async enablePrivateEndpoints(ref: ClusterRef, options: CallOptions = {}): Promise<void> {
    await this.send({ method: 'POST', path: `${clusterPath(ref)}/privateendpoint`, ...options });
  }

  async disablePrivateEndpoints(ref: ClusterRef, options: CallOptions = {}): Promise<void> {
    await this.send({ method: 'DELETE', path: `${clusterPath(ref)}/privateendpoint`, ...options });
  }

  async getPrivateEndpoint(ref: ClusterRef, options: CallOptions = {}) {
    const reply = await this.sendJson(resourceOf(privateEndpointSchema), {
      method: 'GET',
      path: `${clusterPath(ref)}/privateendpoint`,
      ...options,
    });
    return reply.data;
  }

  async getPrivateEndpointDetails(ref: ClusterRef, options: CallOptions = {}) {
    const reply = await this.sendJson(resourceOf(privateEndpointDetailsSchema), {
      method: 'GET',
      path: `${clusterPath(ref)}/privateendpoint/details`,
      ...options,
    });
    return reply.data;
  }

  async listPrivateEndpointLinks(ref: ClusterRef, options: CallOptions = {}) {
    return this.sendJson(endpointLinksPage, {
      method: 'GET',
      path: `${clusterPath(ref)}/privateendpoint/connection`,
      ...options,
    });
  }

  /** The command a VPC owner runs to request a link; the control plane does not run it. */
  async generatePrivateEndpointLinkCommand(
    ref: ClusterRef,
    req: PrivateEndpointLinkRequest,
    options: CallOptions = {},
  ): Promise<string> {
    const reply = await this.sendJson(resourceOf(linkCommandSchema), {
      method: 'POST',
      path: `${clusterPath(ref)}/privateendpoint/linkcommand`,
      body: req,
      ...options,
    });
    return reply.data.command;
  }

  async acceptPrivateEndpointLink(ref: ClusterRef, endpointId: string, options: CallOptions = {}): Promise<void> {
    await this.send({
      method: 'POST',
      path: `${clusterPath(ref)}/privateendpoint/connection`,
      body: { endpointId },
      ...options,
    });
  }

  async listUsers(ref: ClusterRef, page: PageRequest = {}, options: CallOptions = {}) {
    return this.sendJson(usersPage, { method: 'GET', path: `${clusterPath(ref)}/users`, query: page, ...options });
  }

  async createUser(ref: ClusterRef, req: CreateDatabaseUserRequest, options: CallOptions = {}): Promise<void> {
    await this.send({ method: 'POST', path: `${clusterPath(ref)}/users`, body: req, ...options });
  }

  async deleteUser(ref: ClusterRef, userId: string, options: CallOptions = {}): Promise<void> {
    await this.send({ method: 'DELETE', path: `${clusterPath(ref)}/users/${seg(userId)}`, ...options });
  }

  async listBuckets(ref: ClusterRef, options: CallOptions = {}) {
    return this.sendJson(bucketListSchema, { method: 'GET', path: `${clusterPath(ref)}/buckets`, ...options });
  }

  async createBucket(ref: ClusterRef, req: CreateCloudBucketRequest, options: CallOptions = {}): Promise<void> {
    await this.send({ method: 'POST', path: `${clusterPath(ref)}/buckets`, body: req, ...options });
  }

  async deleteBucket(ref: ClusterRef, bucketId: string, options: CallOptions = {}): Promise<void> {
    await this.send({ method: 'DELETE', path: `${clusterPath(ref)}/buckets/${seg(bucketId)}`, ...options });
  }

  async getTrustedCAs(clusterId: string, options: CallOptions = {}) {
    return this.sendJson(z.array(trustedCaSchema), {
      method: 'GET',
      path: `/v2/databases/${seg(clusterId)}/proxy/pools/default/trustedCAs`,
      ...options,
    });
  }

  private async sendJson<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options: RequestOptions): Promise<T> {
    const text = await this.send(options);
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new TransientBackendError(`Control plane ${options.method} ${options.path} returned invalid JSON`, {
        cause: err,
      });
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new TransientBackendError(`Control plane ${options.method} ${options.path} returned an unexpected reply`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  private async send(options: RequestOptions): Promise<string> {
    const path = withQuery(options.path, options.query);
    const maxRetries = options.maxRetries ?? (options.method === 'GET' ? this.maxRetries : 0);
    let reauthenticated = false;
    let retryNum = 0;

    while (true) {
      const headers = await this.authHeaders(options.method, path, options.signal);
      try {
        return await this.execute(options.method, path, headers, options.body, options.signal);
      } catch (err) {
        if (!(err instanceof ControlPlaneRequestError)) throw err;

        if (err.errorName === 'Unauthorized' && this.credentials.kind === 'basic' && !reauthenticated) {
          this.logger.debug('Session rejected; refreshing token', { path });
          reauthenticated = true;
          this.sessionToken = undefined;
          continue;
        }
        if (!err.retryable || retryNum >= maxRetries) {
          this.logger.debug('Request failed', { path, retryNum, maxRetries, error: err.message });
          throw err;
        }
        const waitMs = this.retryDelayMs(retryNum);
        this.logger.debug('Request failed; retrying', { path, retryNum, maxRetries, waitMs, error: err.message });
        retryNum += 1;
        await this.sleep(waitMs, options.signal);
      }
    }
  }

  private async authHeaders(method: Method, path: string, signal?: AbortSignal): Promise<Record<string, string>> {
    if (this.credentials.kind === 'basic' && !this.sessionToken) {
      this.sessionToken = await this.createSession(this.credentials.username, this.credentials.password, signal);
    }
    return signRequest(this.credentials, { method, path }, { sessionToken: this.sessionToken, now: this.now });
  }

  private async createSession(username: string, password: string, signal?: AbortSignal): Promise<string> {
    this.logger.debug('Creating control plane session');
    const headers = { authorization: basicAuthorization(username, password) };
    for (let retryNum = 0; ; retryNum += 1) {
      try {
        const text = await this.execute('POST', '/sessions', headers, undefined, signal);
        const parsed = sessionSchema.safeParse(parseJson(text));
        if (!parsed.success) {
          throw new TransientBackendError('Control plane session reply carried no token', { cause: parsed.error });
        }
        return parsed.data.jwt;
      } catch (err) {
        if (!(err instanceof ControlPlaneRequestError) || !err.retryable || retryNum >= SESSION_MAX_RETRIES) throw err;
        await this.sleep(this.retryDelayMs(retryNum), signal);
      }
    }
  }

  private async execute(
    method: Method,
    path: string,
    headers: Record<string, string>,
    body: unknown,
    signal?: AbortSignal,
  ): Promise<string> {
    throwIfAborted(signal, `${method} ${path}`);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });
    const bodyText = body === undefined ? undefined : JSON.stringify(body);

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(`${this.endpoint}${path}`, {
          method,
          headers: bodyText === undefined ? headers : { ...headers, 'content-type': 'application/json' },
          body: bodyText,
          signal: controller.signal,
        });
      } catch (err) {
        throwIfAborted(signal, `${method} ${path}`);
        const timedOut = controller.signal.aborted;
        throw new ControlPlaneRequestError(
          timedOut
            ? `Control plane ${method} ${path} timed out after ${this.requestTimeoutMs}ms`
            : `Control plane ${method} ${path} failed: ${errorMessage(err)}`,
          { statusCode: 0, fullText: '', retryable: true },
          { cause: err },
        );
      }
      const text = await response.text();
      if (!response.ok) throw buildErrorFromResponse(response.status, text, `${method} ${path}`);
      return text;
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    try {
      await delay(ms, undefined, { signal });
    } catch (err) {
      throwIfAborted(signal, 'retry back-off');
      throw err;
    }
  }
}

function throwIfAborted(signal: AbortSignal | undefined, target: string): void {
  if (!signal?.aborted) return;
  throw new CancellationError('aborted', `Cancelled control plane request ${target}`, { cause: signal.reason });
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function seg(value: string): string {
  return encodeURIComponent(value);
}

function clusterPath(ref: ClusterRef): string {
  return `/v2/organizations/${seg(ref.tenantId)}/projects/${seg(ref.projectId)}/clusters/${seg(ref.clusterId)}`;
}

function withQuery(path: string, query: RequestOptions['query']): string {
  if (!query) return path;
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    params.set(key, String(value));
  }
  const encoded = params.toString();
  return encoded ? `${path}?${encoded}` : path;
}
