import { describe, expect, it } from 'vitest';
import { ConfigurationError, LoggerService } from '@dyncluster/deploy-core';

import { RegistryImageProvider, imagePathFor, parseImagePath } from '../src/images/image.provider';
import type { ImageDef } from '../src/images/imageSelector';
import { FakeDockerEngine } from './helpers/fakeDocker';

const repos = { releaseRepository: 'couchbase/server', buildRepository: 'registry.example/server-builds' };
const logger = new LoggerService({ level: 'error', sink: () => {} });

const def = (overrides: Partial<ImageDef>): ImageDef => ({
  version: '7.2.4',
  buildNo: 0,
  communityEdition: false,
  serverless: false,
  columnar: false,
  ...overrides,
});

describe('imagePathFor', () => {
  it('names released images by edition', () => {
    expect(imagePathFor(def({}), repos)).toBe('couchbase/server:enterprise-7.2.4');
    expect(imagePathFor(def({ communityEdition: true }), repos)).toBe('couchbase/server:community-7.2.4');
  });

  it('names internal builds with their flags', () => {
    expect(imagePathFor(def({ version: '8.0.0', buildNo: 1234, serverless: true, columnar: true }), repos)).toBe(
      'registry.example/server-builds:8.0.0-1234-serverless-columnar',
    );
  });

  it('refuses builds it cannot name', () => {
    expect(() => imagePathFor(def({ buildNo: 5, communityEdition: true }), repos)).toThrow(ConfigurationError);
    expect(() => imagePathFor(def({ buildNo: 5 }), { releaseRepository: 'couchbase/server' })).toThrow(
      /no build repository/,
    );
  });
});

describe('parseImagePath', () => {
  it('reads released and build tags', () => {
    expect(parseImagePath('couchbase/server:community-7.1.0', repos)?.def).toEqual(
      def({ version: '7.1.0', communityEdition: true }),
    );
    expect(parseImagePath('registry.example/server-builds:7.6.0-2001-columnar', repos)).toEqual({
      source: 'build',
      path: 'registry.example/server-builds:7.6.0-2001-columnar',
      def: def({ version: '7.6.0', buildNo: 2001, columnar: true }),
    });
  });

  it('ignores foreign images', () => {
    expect(parseImagePath('redis:7', repos)).toBeNull();
    expect(parseImagePath('couchbase/server:latest', repos)).toBeNull();
  });
});

describe('RegistryImageProvider', () => {
  function provider() {
    const docker = new FakeDockerEngine();
    docker.localImages.push(
      { id: 'sha256:a', repoTags: ['couchbase/server:enterprise-7.2.0', 'couchbase/server:community-7.2.0'] },
      { id: 'sha256:b', repoTags: ['couchbase/server:enterprise-7.10.1'] },
      { id: 'sha256:c', repoTags: ['registry.example/server-builds:7.2.0-3000'] },
      { id: 'sha256:d', repoTags: ['couchbase/server:enterprise-7.20.0', 'redis:7'] },
    );
    return { docker, images: new RegistryImageProvider(docker, repos, logger) };
  }

  it('lists deployable images in ascending order', async () => {
    const { images } = provider();

    const listed = await images.listImages();

    expect(listed.map((i) => i.path)).toEqual([
      'couchbase/server:community-7.2.0',
      'couchbase/server:enterprise-7.2.0',
      'registry.example/server-builds:7.2.0-3000',
      'couchbase/server:enterprise-7.10.1',
      'couchbase/server:enterprise-7.20.0',
    ]);
  });

  it('searches by version prefix', async () => {
    const { images } = provider();

    const found = await images.searchImages('7.2');

    expect(found.map((i) => i.path)).toEqual([
      'couchbase/server:community-7.2.0',
      'couchbase/server:enterprise-7.2.0',
      'registry.example/server-builds:7.2.0-3000',
    ]);
  });

  it('pulls an image only when it is not present', async () => {
    const { docker, images } = provider();

    expect(await images.getImage(def({ version: '7.2.0' }))).toBe('couchbase/server:enterprise-7.2.0');
    expect(await images.getImage(def({ version: '7.6.1' }))).toBe('couchbase/server:enterprise-7.6.1');

    expect(docker.pulled).toEqual(['couchbase/server:enterprise-7.6.1']);
  });

  it('uses raw references as given', async () => {
    const { docker, images } = provider();

    expect(await images.getImageRaw(' couchbase/server:7.6.2 ')).toBe('couchbase/server:7.6.2');
    await expect(images.getImageRaw('  ')).rejects.toBeInstanceOf(ConfigurationError);
    expect(docker.pulled).toEqual(['couchbase/server:7.6.2']);
  });
});
