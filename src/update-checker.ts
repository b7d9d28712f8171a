import type { UnlockLevel, UpdatedDependency } from './types.js';

/**
 * What the decision engine needs to know about a single dependency. Each
 * dependency ecosystem provides its own implementation.
 */
export type UpdateChecker = {
  /**
   * The name of the dependency being checked.
   */
  readonly dependencyName: string;

  /**
   * Whether the declarations of the dependency may be rewritten at all. When
   * false, only an update at the `none` level is considered.
   */
  readonly requirementsUnlockable: boolean;

  isUpToDate(): Promise<boolean>;

  canUpdate(unlockLevel: UnlockLevel): Promise<boolean>;

  /**
   * Describes every dependency that changes when this one is updated at the
   * given level, this one included.
   *
   * @param unlockLevel - The unlock level.
   * @returns The updated dependencies, or an empty array if no update is
   * possible at that level.
   */
  updatedDependencies(unlockLevel: UnlockLevel): Promise<UpdatedDependency[]>;
};
