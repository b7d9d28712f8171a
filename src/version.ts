import semver, { type SemVer } from 'semver';
import { MalformedTagError } from './errors.js';

/**
 * Captures the version at the end of a tag name: either a bare major version
 * right after a leading `v` (`v2`, `v2-beta`), or anything that starts with
 * `<major>.<minor>` (`1.2`, `module-1.2.3`, `v1.2.3-rc.1`).
 */
export const VERSION_TAG_REGEX =
  /(?<version>(?<=^v)[0-9]+(?:-[a-z0-9]+)?|[0-9]+\.[0-9]+(?:\.[a-z0-9-]+)*)$/iu;

/**
 * Extracts the version substring from the given tag name or git ref.
 *
 * @param tagName - A tag name such as `v1.2.3`.
 * @returns The version substring, or null if there is none.
 */
export function extractVersionFromTagName(tagName: string): string | null {
  return tagName.match(VERSION_TAG_REGEX)?.groups?.version ?? null;
}

/**
 * Determines whether the given tag name carries a version.
 *
 * @param tagName - A tag name.
 * @returns True or false, depending on the result.
 */
export function isVersionTagName(tagName: string): boolean {
  return extractVersionFromTagName(tagName) !== null;
}

/**
 * Splits a version into lowercase segments, dropping leading zeros from
 * numeric segments and trailing zero segments, so that `1.2`, `1.02` and
 * `1.2.0` end up the same.
 *
 * @param version - The version string.
 * @returns The canonical segments.
 */
function getCanonicalSegments(version: string): string[] {
  const segments = version
    .toLowerCase()
    .split('.')
    .map((segment) =>
      /^[0-9]+$/u.test(segment)
        ? segment.replace(/^0+(?=[0-9])/u, '')
        : segment,
    );

  while (segments.length > 1 && segments[segments.length - 1] === '0') {
    segments.pop();
  }

  return segments;
}

/**
 * A version extracted from a tag name.
 */
export class ResolvedVersion {
  readonly raw: string;

  readonly segments: readonly string[];

  constructor(raw: string) {
    this.raw = raw;
    this.segments = getCanonicalSegments(raw);
  }

  /**
   * Builds a version out of the version substring of a tag name.
   *
   * @param tagName - The tag name, e.g. `v1.2.3`.
   * @returns The version, e.g. `1.2.3`.
   * @throws MalformedTagError if the name has no version substring.
   */
  static fromTagName(tagName: string): ResolvedVersion {
    const version = extractVersionFromTagName(tagName);

    if (version === null) {
      throw new MalformedTagError(tagName);
    }

    return new ResolvedVersion(version);
  }

  equals(other: ResolvedVersion): boolean {
    return (
      this.segments.length === other.segments.length &&
      this.segments.every((segment, index) => segment === other.segments[index])
    );
  }

  /**
   * Orders this version against another. Versions that are not valid
   * semantic versions are coerced first (`1.2` is read as `1.2.0`); if that
   * fails for either side, the raw strings are compared numerically.
   *
   * @param other - The version to compare against.
   * @returns A negative number, zero or a positive number.
   */
  compare(other: ResolvedVersion): number {
    const ownSemver = this.toSemVer();
    const otherSemver = other.toSemVer();

    if (ownSemver === null || otherSemver === null) {
      return this.raw.localeCompare(other.raw, 'en', { numeric: true });
    }

    return semver.compare(ownSemver, otherSemver);
  }

  toSemVer(): SemVer | null {
    return semver.parse(this.raw, { loose: true }) ?? semver.coerce(this.raw);
  }

  toString(): string {
    return this.raw;
  }
}
