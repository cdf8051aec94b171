import type { fetch as undiciFetch } from 'undici';
import type { DeployConfig, LoggerService } from '@dyncluster/deploy-core';

import type { DockerClientPort } from '../lib/dockerClient.port';
import { DockerodeClient } from '../lib/dockerode.client';
import { RegistryImageProvider } from '../images/image.provider';
import { NodeManagementClient } from '../mgmt/nodeManager.client';
import { ManagementReadinessProbe, type ManagementClientFactory } from '../mgmt/readiness.probe';
import { NodeController } from '../nodes/node.controller';
import { ContainerNodeStateStore } from '../nodes/nodeState.store';
import { TrafficController } from '../nodes/trafficControl';
import { DockerDeployer } from './docker.deployer';

export type DockerDeployerOverrides = {
  docker?: DockerClientPort;
  fetchImpl?: typeof undiciFetch;
  managementClientFor?: ManagementClientFactory;
};

/** Wires the container backend from loaded configuration. */
export function createDockerDeployer(
  config: DeployConfig,
  logger: LoggerService,
  overrides: DockerDeployerOverrides = {},
): DockerDeployer {
  const docker = overrides.docker ?? new DockerodeClient({ socketPath: config.dockerSocket, logger });
  const managementClientFor: ManagementClientFactory =
    overrides.managementClientFor ??
    ((endpoint) =>
      new NodeManagementClient({
        endpoint,
        username: config.admin.username,
        password: config.admin.password,
        logger,
        fetchImpl: overrides.fetchImpl,
      }));

  const nodes = new NodeController({
    docker,
    stateStore: new ContainerNodeStateStore(docker),
    trafficController: new TrafficController({ docker, networkName: config.networkName, logger }),
    readiness: new ManagementReadinessProbe(managementClientFor, config.readiness, logger),
    networkName: config.networkName,
    creator: config.creator,
    logger,
    removal: config.removal,
  });

  return new DockerDeployer({
    docker,
    nodes,
    images: new RegistryImageProvider(docker, config.images, logger),
    managementClientFor,
    networkName: config.networkName,
    waits: config.readiness,
    logger,
  });
}
