import { describe, expect, it } from 'vitest';

import { compareImageDefs, compareVersions, type ImageDef } from '../src/images/imageSelector';

const def = (overrides: Partial<ImageDef>): ImageDef => ({
  version: '7.2.0',
  buildNo: 0,
  communityEdition: false,
  serverless: false,
  columnar: false,
  ...overrides,
});

describe('compareVersions', () => {
  it.each([
    ['7.2.0', '7.10.0', -1],
    ['v7.2.4', '7.2.4', 0],
    ['7.2', '7.2.0', 0],
    ['8.0.0', '7.6.3', 1],
    ['7.6.0-beta', '7.6.0', -1],
    ['not-a-version', '1.0.0', -1],
    ['1.0.0', 'garbage', 1],
    ['foo', 'bar', 0],
    ['abc7', '7.0.0', -1],
    ['7.2.0.1', '7.2.0', -1],
    ['7.2.0.1', 'garbage', 0],
  ])('%s vs %s -> %i', (a, b, expected) => {
    expect(compareVersions(a, b)).toBe(expected);
  });
});

describe('compareImageDefs', () => {
  it('orders by version before anything else', () => {
    expect(compareImageDefs(def({ version: '7.1.0', buildNo: 9000, columnar: true }), def({ version: '7.2.0' }))).toBe(-1);
  });

  it('breaks version ties by build number', () => {
    expect(compareImageDefs(def({ buildNo: 1200 }), def({ buildNo: 1100 }))).toBe(1);
  });

  it('ranks community below enterprise, then classic below serverless and columnar', () => {
    expect(compareImageDefs(def({ communityEdition: true }), def({}))).toBe(-1);
    expect(compareImageDefs(def({ serverless: true }), def({}))).toBe(1);
    expect(compareImageDefs(def({ columnar: true }), def({}))).toBe(1);
    expect(compareImageDefs(def({ serverless: true }), def({ columnar: true }))).toBe(1);
  });

  it('is a total order over a mixed set', () => {
    const defs: ImageDef[] = [];
    for (const version of ['7.0.0', '7.2', 'v7.10.1', 'weird']) {
      for (const buildNo of [0, 42]) {
        for (const communityEdition of [false, true]) {
          defs.push(def({ version, buildNo, communityEdition, serverless: buildNo === 42, columnar: !communityEdition }));
        }
      }
    }

    for (const a of defs) {
      expect(compareImageDefs(a, a)).toBe(0);
      for (const b of defs) {
        expect(compareImageDefs(a, b)).toBe(-compareImageDefs(b, a) || 0);
        for (const c of defs) {
          if (compareImageDefs(a, b) <= 0 && compareImageDefs(b, c) <= 0) {
            expect(compareImageDefs(a, c)).toBeLessThanOrEqual(0);
          }
        }
      }
    }
  });
});
