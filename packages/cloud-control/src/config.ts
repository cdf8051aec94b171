import { z } from 'zod';
import { ConfigurationError } from '@dyncluster/deploy-core';

import type { ControlPlaneCredentials } from './credentials';

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const controlPlaneEnvSchema = z.object({
  endpoint: z.string({ required_error: 'DYNCLUSTER_CLOUD_ENDPOINT is required' }).trim().url(),
  tenantId: optionalString,
  username: optionalString,
  password: optionalString,
  accessKey: optionalString,
  secretKey: optionalString,
  requestTimeoutMs: z
    .string()
    .optional()
    .transform((value) => {
      const num = Number(value);
      return Number.isInteger(num) && num > 0 ? num : 30_000;
    }),
});

export type ControlPlaneConfig = {
  endpoint: string;
  /** Organisation the cloud backend works in, when configured. */
  tenantId?: string;
  credentials: ControlPlaneCredentials;
  requestTimeoutMs: number;
};

/**
 * Reads control plane settings. Username/password wins over an access key pair when both
 * are present.
 */
export function loadControlPlaneConfig(env: NodeJS.ProcessEnv = process.env): ControlPlaneConfig {
  const parsed = controlPlaneEnvSchema.safeParse({
    endpoint: env.DYNCLUSTER_CLOUD_ENDPOINT,
    tenantId: env.DYNCLUSTER_CLOUD_TENANT_ID,
    username: env.DYNCLUSTER_CLOUD_USERNAME,
    password: env.DYNCLUSTER_CLOUD_PASSWORD,
    accessKey: env.DYNCLUSTER_CLOUD_ACCESS_KEY,
    secretKey: env.DYNCLUSTER_CLOUD_SECRET_KEY,
    requestTimeoutMs: env.DYNCLUSTER_CLOUD_REQUEST_TIMEOUT_MS,
  });
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid control plane configuration: ${details}`);
  }

  const { endpoint, tenantId, username, password, accessKey, secretKey, requestTimeoutMs } = parsed.data;
  let credentials: ControlPlaneCredentials;
  if (username && password) {
    credentials = { kind: 'basic', username, password };
  } else if (accessKey && secretKey) {
    credentials = { kind: 'token', accessKey, secretKey };
  } else {
    throw new ConfigurationError(
      'Control plane credentials missing: set DYNCLUSTER_CLOUD_USERNAME/_PASSWORD or DYNCLUSTER_CLOUD_ACCESS_KEY/_SECRET_KEY',
    );
  }
  return { endpoint: endpoint.replace(/\/+$/, ''), tenantId, credentials, requestTimeoutMs };
}
