import type { fetch as undiciFetch } from 'undici';
import type { LoggerService } from '@dyncluster/deploy-core';

import type { ControlPlaneConfig } from './config';
import { ControlPlaneClient } from './controlPlane.client';

export function createControlPlaneClient(
  config: ControlPlaneConfig,
  logger: LoggerService,
  overrides: { fetchImpl?: typeof undiciFetch } = {},
): ControlPlaneClient {
  return new ControlPlaneClient({
    endpoint: config.endpoint,
    credentials: config.credentials,
    requestTimeoutMs: config.requestTimeoutMs,
    logger,
    fetchImpl: overrides.fetchImpl,
  });
}
