import type { UpdateChecker } from './update-checker.js';
import type { VersionResolutionStrategy } from './version-resolution-strategy.js';
import type {
  Dependency,
  Requirement,
  Tag,
  UnlockLevel,
  UpdatedDependency,
} from './types.js';
import { ResolvedVersion } from './version.js';

/**
 * Checks a Terraform module sourced from git against the tags of its
 * repository.
 *
 * The Terraform dependency lock file only tracks providers, so the unlock
 * level never stands in the way of an update. At `none` the requirements are
 * left as declared; at `own` and `all` their refs move to the latest tag.
 * Modules place no constraints on each other, so `all` is no different from
 * `own`.
 */
export class TerraformUpdateChecker implements UpdateChecker {
  readonly dependency: Dependency;

  readonly strategy: VersionResolutionStrategy;

  #tags: Promise<Tag[]> | undefined;

  constructor({
    dependency,
    strategy,
  }: {
    dependency: Dependency;
    strategy: VersionResolutionStrategy;
  }) {
    this.dependency = dependency;
    this.strategy = strategy;
  }

  get dependencyName(): string {
    return this.dependency.name;
  }

  get requirementsUnlockable(): boolean {
    return this.dependency.requirements.every(
      (requirement) => requirement.unlockLevel !== 'none',
    );
  }

  async isUpToDate(): Promise<boolean> {
    const latestVersion = await this.#getLatestVersion();
    return this.strategy.isUpToDate(
      this.dependency.currentVersion,
      latestVersion,
    );
  }

  async canUpdate(_unlockLevel: UnlockLevel): Promise<boolean> {
    return !(await this.isUpToDate());
  }

  async updatedDependencies(
    unlockLevel: UnlockLevel,
  ): Promise<UpdatedDependency[]> {
    if (!(await this.canUpdate(unlockLevel))) {
      return [];
    }

    const latestTag = await this.#getLatestTag();
    const latestVersion = ResolvedVersion.fromTagName(latestTag.name);
    const { name, currentVersion, requirements } = this.dependency;

    return [
      {
        name,
        previousVersion: currentVersion.toString(),
        newVersion: latestVersion.toString(),
        requirements:
          unlockLevel === 'none'
            ? requirements
            : requirements.map(
                (requirement): Requirement => ({
                  ...requirement,
                  declaredSource: {
                    ...requirement.declaredSource,
                    ref: latestTag.name,
                  },
                }),
              ),
        previousRequirements: requirements,
      },
    ];
  }

  async #getTags(): Promise<Tag[]> {
    if (this.#tags === undefined) {
      this.#tags = this.dependency.tagSource.allowedVersionTags();
    }

    return await this.#tags;
  }

  async #getLatestTag(): Promise<Tag> {
    return this.strategy.selectLatestTag(await this.#getTags());
  }

  async #getLatestVersion(): Promise<ResolvedVersion> {
    return this.strategy.resolveLatest(await this.#getTags());
  }
}
