import { z } from 'zod';

import { ConfigurationError } from './errors';
import { LOG_LEVELS } from './logger.service';

const positiveInt = (defaultValue: number) =>
  z
    .union([z.string(), z.number()])
    .default(String(defaultValue))
    .transform((value) => {
      const num = typeof value === 'number' ? value : Number(value.trim());
      return Number.isInteger(num) && num > 0 ? num : defaultValue;
    });

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const deployConfigSchema = z.object({
  dockerSocket: z.string().min(1).default('/var/run/docker.sock'),
  networkName: z.string().min(1).default('dyncluster_net'),
  creator: z.string().min(1).default('unknown'),
  logLevel: z
    .string()
    .default('info')
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(LOG_LEVELS)),
  readiness: z
    .object({
      timeoutMs: positiveInt(300_000),
      intervalMs: positiveInt(1_000),
    })
    .default({}),
  removal: z
    .object({
      timeoutMs: positiveInt(60_000),
      intervalMs: positiveInt(100),
    })
    .default({}),
  images: z
    .object({
      releaseRepository: z.string().min(1).default('couchbase/server'),
      buildRepository: optionalString,
    })
    .default({}),
  admin: z
    .object({
      username: z.string().min(1).default('Administrator'),
      password: z.string().min(6, 'DYNCLUSTER_ADMIN_PASSWORD must be at least 6 characters').default('password'),
    })
    .default({}),
});

export type DeployConfig = z.infer<typeof deployConfigSchema>;

export function loadDeployConfig(env: NodeJS.ProcessEnv = process.env): DeployConfig {
  const parsed = deployConfigSchema.safeParse({
    dockerSocket: nonEmpty(env.DYNCLUSTER_DOCKER_SOCKET) ?? nonEmpty(env.DOCKER_SOCKET),
    networkName: nonEmpty(env.DYNCLUSTER_NETWORK),
    creator: nonEmpty(env.DYNCLUSTER_CREATOR) ?? nonEmpty(env.USER),
    logLevel: nonEmpty(env.DYNCLUSTER_LOG_LEVEL),
    readiness: {
      timeoutMs: env.DYNCLUSTER_READY_TIMEOUT_MS,
      intervalMs: env.DYNCLUSTER_READY_INTERVAL_MS,
    },
    removal: {
      timeoutMs: env.DYNCLUSTER_REMOVE_TIMEOUT_MS,
      intervalMs: env.DYNCLUSTER_REMOVE_INTERVAL_MS,
    },
    images: {
      releaseRepository: nonEmpty(env.DYNCLUSTER_IMAGE_REPOSITORY),
      buildRepository: env.DYNCLUSTER_BUILD_REPOSITORY,
    },
    admin: {
      username: nonEmpty(env.DYNCLUSTER_ADMIN_USERNAME),
      password: nonEmpty(env.DYNCLUSTER_ADMIN_PASSWORD),
    },
  });
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid dyncluster configuration: ${details}`);
  }
  return parsed.data;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
