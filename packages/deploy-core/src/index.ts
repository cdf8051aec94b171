export * from './errors';
export * from './polling';
export * from './logger.service';
export * from './config';
export * from './env';
export * from './clusterDef';
export * from './deployer';
export { parseYaml, stringifyYaml } from './yaml.util';
