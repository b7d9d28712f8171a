import { debug } from './misc-utils.js';
import { TerraformUpdateChecker } from './terraform-update-checker.js';
import type {
  Dependency,
  Requirement,
  UnlockLevel,
  UpdatedDependency,
} from './types.js';
import type { UpdateChecker } from './update-checker.js';
import type { VersionResolutionStrategy } from './version-resolution-strategy.js';

/**
 * The dependency can and should be updated.
 *
 * `chosenUnlockLevel` is the least invasive level at which the update can be
 * expressed. `updatedDependencies` lists everything that changes, the
 * dependency itself included; the other properties describe the dependency
 * itself.
 */
export type UpdateDecision = {
  kind: 'update';
  dependency: Dependency;
  chosenUnlockLevel: UnlockLevel;
  updatedRequirements: Requirement[];
  previousVersion: string;
  newVersion: string;
  updatedDependencies: UpdatedDependency[];
};

/**
 * The dependency is pinned to the latest version.
 */
export type NoUpdateNeeded = {
  kind: 'no-update-needed';
  dependency: Dependency;
};

/**
 * The dependency is behind, but no unlock level allows the update to be
 * expressed. This is a normal outcome, not an error.
 */
export type UpdateNotPossible = {
  kind: 'update-not-possible';
  dependency: Dependency;
};

export type DecisionOutcome = UpdateDecision | NoUpdateNeeded | UpdateNotPossible;

/**
 * Builds the update checker for a dependency.
 */
export type UpdateCheckerFactory = (args: {
  dependency: Dependency;
  strategy: VersionResolutionStrategy;
}) => UpdateChecker;

/**
 * Finds the least invasive unlock level at which the given checker can express
 * an update. When the requirements cannot be unlocked, only `none` is tried;
 * otherwise `own` and then `all`.
 *
 * @param checker - The checker for the dependency.
 * @returns The chosen unlock level, or null if none works.
 */
export async function chooseUnlockLevel(
  checker: UpdateChecker,
): Promise<UnlockLevel | null> {
  const candidateLevels: UnlockLevel[] = checker.requirementsUnlockable
    ? ['own', 'all']
    : ['none'];

  for (const unlockLevel of candidateLevels) {
    if (await checker.canUpdate(unlockLevel)) {
      return unlockLevel;
    }
  }

  return null;
}

/**
 * Decides, for one dependency at a time, whether it needs an update and how
 * that update is expressed.
 */
export class UpdateDecisionEngine {
  readonly strategy: VersionResolutionStrategy;

  readonly #createUpdateChecker: UpdateCheckerFactory;

  constructor({
    strategy,
    createUpdateChecker = (args) => new TerraformUpdateChecker(args),
  }: {
    strategy: VersionResolutionStrategy;
    createUpdateChecker?: UpdateCheckerFactory;
  }) {
    this.strategy = strategy;
    this.#createUpdateChecker = createUpdateChecker;
  }

  /**
   * Decides what to do about the given dependency.
   *
   * @param dependency - The dependency.
   * @returns The outcome of the decision.
   * @throws TagResolutionError if the tag history of the dependency cannot be
   * resolved to a version.
   */
  async decide(dependency: Dependency): Promise<DecisionOutcome> {
    const checker = this.#createUpdateChecker({
      dependency,
      strategy: this.strategy,
    });

    if (await checker.isUpToDate()) {
      return { kind: 'no-update-needed', dependency };
    }

    const chosenUnlockLevel = await chooseUnlockLevel(checker);

    if (chosenUnlockLevel === null) {
      debug(`Module '${dependency.name}' is outdated but cannot be updated`);
      return { kind: 'update-not-possible', dependency };
    }

    const updatedDependencies =
      await checker.updatedDependencies(chosenUnlockLevel);
    const ownUpdate = updatedDependencies.find(
      (updatedDependency) => updatedDependency.name === dependency.name,
    );

    if (ownUpdate === undefined) {
      throw new Error(
        `Update of module '${dependency.name}' at unlock level '${chosenUnlockLevel}' does not include the module itself`,
      );
    }

    return {
      kind: 'update',
      dependency,
      chosenUnlockLevel,
      updatedRequirements: ownUpdate.requirements,
      previousVersion: ownUpdate.previousVersion,
      newVersion: ownUpdate.newVersion,
      updatedDependencies,
    };
  }
}
