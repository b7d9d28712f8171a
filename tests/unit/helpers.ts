import type {
  Dependency,
  GitTagSource,
  Requirement,
  Tag,
} from '../../src/types.js';
import { ResolvedVersion } from '../../src/version.js';

/**
 * Builds a fixed tag source out of tag names, oldest first. Commit SHAs are
 * derived from the position of each tag unless given.
 *
 * @param tagNames - The names of the tags.
 * @param commitShas - The commit SHAs of the tags, by tag name.
 * @returns The tag source.
 */
export function buildMockTagSource(
  tagNames: readonly string[],
  commitShas: Record<string, string> = {},
): GitTagSource {
  const tags = buildMockTags(tagNames, commitShas);
  return {
    allowedVersionTags: async () => tags,
  };
}

/**
 * Builds tags out of tag names, oldest first.
 *
 * @param tagNames - The names of the tags.
 * @param commitShas - The commit SHAs of the tags, by tag name.
 * @returns The tags.
 */
export function buildMockTags(
  tagNames: readonly string[],
  commitShas: Record<string, string> = {},
): Tag[] {
  return tagNames.map((name, pushOrder) => ({
    name,
    pushOrder,
    commitSha: commitShas[name] ?? String(pushOrder).padStart(40, '0'),
  }));
}

/**
 * Builds a requirement pinned to a version tag.
 *
 * @param overrides - The properties that will go into the requirement.
 * @returns The mock requirement.
 */
export function buildMockRequirement(
  overrides: Partial<Requirement> = {},
): Requirement {
  return {
    file: 'main.tf',
    declaredSource: {
      url: 'https://github.com/example/vpc.git',
      ref: 'v1.0.0',
    },
    unlockLevel: 'own',
    ...overrides,
  };
}

/**
 * Specifies how a mock dependency should be defined.
 */
type MockDependencyOverrides = Partial<Omit<Dependency, 'currentVersion'>> & {
  currentVersion?: string;
  tagNames?: readonly string[];
};

/**
 * Builds a dependency object for use in tests. All properties have default
 * values, so you can specify only the properties you care about.
 *
 * @param overrides - The properties that will go into the object.
 * @returns The mock Dependency object.
 */
export function buildMockDependency({
  currentVersion = '1.0.0',
  tagNames = ['v1.0.0'],
  ...rest
}: MockDependencyOverrides = {}): Dependency {
  return {
    name: 'github.com/example/vpc',
    currentVersion: new ResolvedVersion(currentVersion),
    requirements: [buildMockRequirement()],
    topLevel: true,
    tagSource: buildMockTagSource(tagNames),
    ...rest,
  };
}

/**
 * Builds a stream that collects what is written to it.
 *
 * @returns The stream along with a function that returns what was written.
 */
export function createCollectingWriteStream(): {
  stream: { write: (chunk: string) => boolean };
  getOutput: () => string;
} {
  const chunks: string[] = [];
  return {
    stream: {
      write: (chunk: string) => {
        chunks.push(chunk);
        return true;
      },
    },
    getOutput: () => chunks.join(''),
  };
}
