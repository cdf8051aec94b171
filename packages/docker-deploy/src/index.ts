export * from './lib/types';
export type { DockerClientPort } from './lib/dockerClient.port';
export { DockerodeClient, type DockerodeClientOptions } from './lib/dockerode.client';
export * from './nodes/nodeLabels';
export * from './nodes/node.catalog';
export * from './nodes/nodeState.store';
export * from './nodes/trafficControl';
export * from './nodes/node.controller';
export * from './images/imageSelector';
export * from './images/image.provider';
export * from './mgmt/nodeManager.client';
export * from './mgmt/readiness.probe';
export * from './deployer/docker.deployer';
export * from './deployer/factory';
