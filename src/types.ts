import type { ResolvedVersion } from './version.js';

/**
 * How much of a dependency's declaration may be rewritten to express an
 * update, from least to most invasive:
 *
 * - `none`: nothing in the declaration changes, only the underlying resolution.
 * - `own`: the declaration of the dependency itself may change.
 * - `all`: any declaration standing in the way may change, including those of
 *   other dependencies.
 */
export type UnlockLevel = 'none' | 'own' | 'all';

/**
 * Credentials used to talk to a git host over HTTPS.
 */
export type GitSourceCredential = {
  type: 'git_source';
  host: string;
  username: string;
  password: string;
};

/**
 * A tag published by the upstream source of a module.
 *
 * `pushOrder` is the position of the tag in the upstream history ordered by
 * creation date, oldest first. It says nothing about the version in the name.
 */
export type Tag = {
  name: string;
  pushOrder: number;
  commitSha: string;
};

/**
 * Provides the version tags of a module, oldest first.
 */
export type GitTagSource = {
  allowedVersionTags(): Promise<Tag[]>;
};

/**
 * One place where a dependency is declared.
 *
 * `file` is relative to the scanned directory. `unlockLevel` is the most
 * invasive level at which this declaration may be rewritten.
 */
export type Requirement = {
  file: string;
  declaredSource: {
    url: string;
    ref: string;
  };
  unlockLevel: UnlockLevel;
};

/**
 * A module referenced by the scanned project.
 */
export type Dependency = {
  name: string;
  currentVersion: ResolvedVersion;
  requirements: Requirement[];
  topLevel: boolean;
  tagSource: GitTagSource;
};

/**
 * A dependency as it would look after an update.
 */
export type UpdatedDependency = {
  name: string;
  previousVersion: string;
  newVersion: string;
  requirements: Requirement[];
  previousRequirements: Requirement[];
};

/**
 * A file fetched from the scanned repository.
 *
 * `name` is relative to the scanned directory. Support files come from local
 * module directories rather than from the scanned directory itself.
 */
export type DependencyFile = {
  name: string;
  content: string;
  supportFile: boolean;
};

/**
 * Where a set of dependency files lives.
 */
export type ProjectLocation = {
  repository: string;
  directory: string;
  branch: string | null;
  host: string;
};

/**
 * One line of the final report.
 */
export type UpdateRecord = {
  directory: string;
  file: string;
  moduleUrl: string;
  previousVersion: string;
  newVersion: string;
};
