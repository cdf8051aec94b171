import { ConfigurationError, type LoggerService } from '@dyncluster/deploy-core';

import type { DockerClientPort } from '../lib/dockerClient.port';
import { compareImageDefs, type ImageDef } from './imageSelector';

export type ImageRepositories = {
  releaseRepository: string;
  buildRepository?: string;
};

export type DeployableImage = {
  source: 'release' | 'build';
  path: string;
  def: ImageDef;
};

export interface ImageProvider {
  /** Resolves a descriptor to a local image, pulling it when absent. */
  getImage(def: ImageDef): Promise<string>;
  /** Uses an image reference as given, pulling it when absent. */
  getImageRaw(path: string): Promise<string>;
  listImages(): Promise<DeployableImage[]>;
  searchImages(version: string): Promise<DeployableImage[]>;
}

const RELEASE_TAG_RE = /^(community|enterprise)-(.+)$/;
const BUILD_TAG_RE = /^(\d+(?:\.\d+)*)-(\d+)(-serverless)?(-columnar)?$/;

/**
 * Released images: `<release>:<edition>-<version>`. Internal builds:
 * `<build>:<version>-<buildNo>[-serverless][-columnar]`, enterprise only.
 */
export function imagePathFor(def: ImageDef, repos: ImageRepositories): string {
  if (def.buildNo === 0 && !def.serverless && !def.columnar) {
    const edition = def.communityEdition ? 'community' : 'enterprise';
    return `${repos.releaseRepository}:${edition}-${def.version}`;
  }
  if (def.communityEdition) {
    throw new ConfigurationError(`Community edition has no internal build images (version ${def.version})`);
  }
  if (!repos.buildRepository) {
    throw new ConfigurationError('An internal build image was requested but no build repository is configured');
  }
  let tag = `${def.version}-${def.buildNo}`;
  if (def.serverless) tag += '-serverless';
  if (def.columnar) tag += '-columnar';
  return `${repos.buildRepository}:${tag}`;
}

export function parseImagePath(path: string, repos: ImageRepositories): DeployableImage | null {
  const sep = path.lastIndexOf(':');
  if (sep <= 0) return null;
  const repository = path.slice(0, sep);
  const tag = path.slice(sep + 1);

  if (repository === repos.releaseRepository) {
    const match = RELEASE_TAG_RE.exec(tag);
    if (!match) return null;
    return {
      source: 'release',
      path,
      def: { version: match[2], buildNo: 0, communityEdition: match[1] === 'community', serverless: false, columnar: false },
    };
  }
  if (repos.buildRepository && repository === repos.buildRepository) {
    const match = BUILD_TAG_RE.exec(tag);
    if (!match) return null;
    return {
      source: 'build',
      path,
      def: {
        version: match[1],
        buildNo: Number(match[2]),
        communityEdition: false,
        serverless: match[3] !== undefined,
        columnar: match[4] !== undefined,
      },
    };
  }
  return null;
}

export class RegistryImageProvider implements ImageProvider {
  private readonly logger: LoggerService;

  constructor(
    private readonly docker: DockerClientPort,
    private readonly repos: ImageRepositories,
    logger: LoggerService,
  ) {
    this.logger = logger.child({ component: 'RegistryImageProvider' });
  }

  async getImage(def: ImageDef): Promise<string> {
    const path = imagePathFor(def, this.repos);
    this.logger.debug('Resolving image', { path });
    await this.docker.ensureImage(path);
    return path;
  }

  async getImageRaw(path: string): Promise<string> {
    const trimmed = path.trim();
    if (!trimmed) throw new ConfigurationError('Image reference must not be empty');
    this.logger.debug('Resolving raw image', { path: trimmed });
    await this.docker.ensureImage(trimmed);
    return trimmed;
  }

  async listImages(): Promise<DeployableImage[]> {
    const images = await this.docker.listImages();
    const seen = new Set<string>();
    const found: DeployableImage[] = [];
    for (const image of images) {
      for (const tag of image.repoTags) {
        if (seen.has(tag)) continue;
        const parsed = parseImagePath(tag, this.repos);
        if (!parsed) continue;
        seen.add(tag);
        found.push(parsed);
      }
    }
    return found.sort((a, b) => compareImageDefs(a.def, b.def));
  }

  /** Matches `7.2` against 7.2, 7.2.x and 7.2-... but not 7.20. */
  async searchImages(version: string): Promise<DeployableImage[]> {
    const images = await this.listImages();
    return images.filter(
      (image) =>
        image.def.version === version ||
        image.def.version.startsWith(`${version}.`) ||
        image.def.version.startsWith(`${version}-`),
    );
  }
}
