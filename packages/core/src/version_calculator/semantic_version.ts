import semver from 'semver';
import type { ReleaseType } from 'semver';
import { VersionParseError } from './errors';

export type SemanticVersion = {
  major: number;
  minor: number;
  patch: number;
};

export const DEFAULT_SEED_VERSION: Readonly<SemanticVersion> = Object.freeze({
  major: 0,
  minor: 1,
  patch: 0,
});

const VERSION_PATTERN = /^v?(\d+)\.(\d+)\.(\d+)$/;

/**
 * Parses `v1.2.3` or `1.2.3`.
 *
 * @throws VersionParseError when the text is not a plain semantic version
 */
export function parseVersion(text: string): SemanticVersion {
  const match = VERSION_PATTERN.exec(text.trim());
  if (!match) {
    throw new VersionParseError(text);
  }
  const [, major = '', minor = '', patch = ''] = match;
  const version = {
    major: Number.parseInt(major, 10),
    minor: Number.parseInt(minor, 10),
    patch: Number.parseInt(patch, 10),
  };
  if (!Number.isSafeInteger(version.major) || !Number.isSafeInteger(version.minor) || !Number.isSafeInteger(version.patch)) {
    throw new VersionParseError(text);
  }
  return version;
}

export function tryParseVersion(text: string): SemanticVersion | null {
  try {
    return parseVersion(text);
  } catch (error) {
    if (error instanceof VersionParseError) {
      return null;
    }
    throw error;
  }
}

// MAJOR.MINOR.PATCH without the "v", as semver expects it
function toSemverString(version: SemanticVersion): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

export function formatVersion(version: SemanticVersion): string {
  return `v${toSemverString(version)}`;
}

/**
 * Tuple order: negative when `a < b`, zero when equal, positive when `a > b`.
 */
export function compareVersions(a: SemanticVersion, b: SemanticVersion): number {
  return semver.compare(toSemverString(a), toSemverString(b));
}

/**
 * Next version for a release type; lower components reset to zero.
 *
 * @example
 * incrementVersion({ major: 1, minor: 2, patch: 3 }, 'minor');
 * // => { major: 1, minor: 3, patch: 0 }
 */
export function incrementVersion(version: SemanticVersion, release: Extract<ReleaseType, 'major' | 'minor' | 'patch'>): SemanticVersion {
  const next = semver.inc(toSemverString(version), release);
  if (next === null) {
    throw new VersionParseError(toSemverString(version));
  }
  return parseVersion(next);
}

export function versionsEqual(a: SemanticVersion, b: SemanticVersion): boolean {
  return compareVersions(a, b) === 0;
}

export function maxVersion(versions: Iterable<SemanticVersion>): SemanticVersion | null {
  let max: SemanticVersion | null = null;
  for (const version of versions) {
    if (max === null || compareVersions(version, max) > 0) {
      max = version;
    }
  }
  return max;
}
