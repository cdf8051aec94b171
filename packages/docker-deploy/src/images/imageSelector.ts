import semver from 'semver';

export type ImageDef = {
  version: string;
  buildNo: number;
  communityEdition: boolean;
  serverless: boolean;
  columnar: boolean;
};

export type Ordering = -1 | 0 | 1;

const SHORT_VERSION_RE = /^\d+\.\d+$/;

/** Accepts an optional `v` prefix and the `major.minor` short form; anything else is unparseable. */
function toSemver(version: string): string | null {
  const stripped = version.trim().replace(/^v/i, '');
  if (semver.valid(stripped)) return stripped;
  if (SHORT_VERSION_RE.test(stripped)) return `${stripped}.0`;
  return null;
}

/** Unparseable versions sort before every valid one and compare equal to each other. */
export function compareVersions(a: string, b: string): Ordering {
  const left = toSemver(a);
  const right = toSemver(b);
  if (left === null || right === null) {
    if (left === right) return 0;
    return left === null ? -1 : 1;
  }
  return semver.compare(left, right);
}

const compareFlags = (a: boolean, b: boolean): Ordering => (a === b ? 0 : a ? 1 : -1);

/**
 * Total order over image descriptors: version, then build number. Remaining ties put
 * community before enterprise, classic before serverless, and classic before columnar.
 */
export function compareImageDefs(a: ImageDef, b: ImageDef): Ordering {
  const byVersion = compareVersions(a.version, b.version);
  if (byVersion !== 0) return byVersion;
  if (a.buildNo !== b.buildNo) return a.buildNo < b.buildNo ? -1 : 1;
  if (a.communityEdition !== b.communityEdition) return a.communityEdition ? -1 : 1;
  const byServerless = compareFlags(a.serverless, b.serverless);
  if (byServerless !== 0) return byServerless;
  return compareFlags(a.columnar, b.columnar);
}
