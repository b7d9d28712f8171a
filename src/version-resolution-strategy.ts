import { NoEligibleTagError } from './errors.js';
import type { Tag } from './types.js';
import { ResolvedVersion } from './version.js';

/**
 * The names by which a strategy can be selected.
 */
export type VersionStrategyName = 'most-recent-tag' | 'highest-version';

export const VERSION_STRATEGY_NAMES: readonly VersionStrategyName[] = [
  'most-recent-tag',
  'highest-version',
];

/**
 * Decides which of the published tags of a module is its latest version, and
 * whether a pinned version counts as current.
 */
export type VersionResolutionStrategy = {
  readonly name: VersionStrategyName;

  /**
   * Picks the tag that represents the latest version.
   *
   * @param tags - Version tags, oldest first.
   * @returns The chosen tag.
   * @throws NoEligibleTagError if there are no tags.
   */
  selectLatestTag(tags: readonly Tag[]): Tag;

  /**
   * Resolves the latest version of a module.
   *
   * @param tags - Version tags, oldest first.
   * @returns The version of the chosen tag.
   * @throws NoEligibleTagError if there are no tags.
   * @throws MalformedTagError if the chosen tag has no version.
   */
  resolveLatest(tags: readonly Tag[]): ResolvedVersion;

  isUpToDate(current: ResolvedVersion, latest: ResolvedVersion): boolean;
};

/**
 * Treats the most recently published tag as the latest version, even when an
 * earlier tag carries a higher version. A module is current only when its
 * pinned version is exactly that of the most recent tag.
 *
 * Note that this accepts a semantic downgrade when upstream publishes a lower
 * version last (e.g. a fix on an older release line).
 */
export class MostRecentTagStrategy implements VersionResolutionStrategy {
  readonly name = 'most-recent-tag';

  selectLatestTag(tags: readonly Tag[]): Tag {
    const latestTag = tags[tags.length - 1];

    if (latestTag === undefined) {
      throw new NoEligibleTagError();
    }

    return latestTag;
  }

  resolveLatest(tags: readonly Tag[]): ResolvedVersion {
    return ResolvedVersion.fromTagName(this.selectLatestTag(tags).name);
  }

  isUpToDate(current: ResolvedVersion, latest: ResolvedVersion): boolean {
    return current.equals(latest);
  }
}

/**
 * The conventional policy: the tag with the highest version wins, and a
 * module is current when its pinned version is at least that high. Among tags
 * with equal versions, the most recently published one is chosen.
 */
export class HighestVersionStrategy implements VersionResolutionStrategy {
  readonly name = 'highest-version';

  selectLatestTag(tags: readonly Tag[]): Tag {
    let latest: { tag: Tag; version: ResolvedVersion } | undefined;

    for (const tag of tags) {
      const version = ResolvedVersion.fromTagName(tag.name);

      if (latest === undefined || version.compare(latest.version) >= 0) {
        latest = { tag, version };
      }
    }

    if (latest === undefined) {
      throw new NoEligibleTagError();
    }

    return latest.tag;
  }

  resolveLatest(tags: readonly Tag[]): ResolvedVersion {
    return ResolvedVersion.fromTagName(this.selectLatestTag(tags).name);
  }

  isUpToDate(current: ResolvedVersion, latest: ResolvedVersion): boolean {
    return current.compare(latest) >= 0;
  }
}

/**
 * Looks up a strategy by name.
 *
 * @param name - The name of the strategy.
 * @returns The strategy.
 */
export function getVersionResolutionStrategy(
  name: VersionStrategyName,
): VersionResolutionStrategy {
  switch (name) {
    case 'highest-version':
      return new HighestVersionStrategy();
    case 'most-recent-tag':
    default:
      return new MostRecentTagStrategy();
  }
}
