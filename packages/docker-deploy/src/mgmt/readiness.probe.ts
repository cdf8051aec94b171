import type { LoggerService } from '@dyncluster/deploy-core';

import type { ReadinessProbe } from '../nodes/node.controller';
import type { NodeManagementApi } from './nodeManager.client';

export type ManagementClientFactory = (endpoint: string) => NodeManagementApi;

/** Readiness = the node's management endpoint answers within the configured bound. */
export class ManagementReadinessProbe implements ReadinessProbe {
  constructor(
    private readonly clientFor: ManagementClientFactory,
    private readonly bounds: { timeoutMs: number; intervalMs: number },
    private readonly logger: LoggerService,
  ) {}

  async waitForReady(endpoint: string, options: { signal?: AbortSignal; resourceId?: string } = {}): Promise<void> {
    const started = Date.now();
    await this.clientFor(endpoint).waitForOnline({ ...this.bounds, ...options });
    this.logger.info('Management endpoint online', {
      endpoint,
      resourceId: options.resourceId,
      waitedMs: Date.now() - started,
    });
  }
}
