/**
 * The environment variables that this tool can use.
 *
 * - GITHUB_REPOSITORY: The `owner/name` of the repository to scan.
 * - INPUT_DIRECTORY: The directories to scan, one per line.
 * - GITHUB_HEAD_REF: The branch to scan, when not the default branch.
 * - INPUT_TOKEN: The token used to clone the repository.
 * - INPUT_GITHUB_DEPENDENCY_TOKEN: The token used to read the tags of modules.
 * - INPUT_VERSION_STRATEGY: How the latest version of a module is picked.
 * - GITHUB_SERVER_URL: The URL of the git host.
 * - GITHUB_ACTION: Set when running inside a workflow.
 * - GITHUB_WORKSPACE: Where the report goes when running inside a workflow.
 */
export type Env = {
  GITHUB_REPOSITORY: string | undefined;
  INPUT_DIRECTORY: string | undefined;
  GITHUB_HEAD_REF: string | undefined;
  INPUT_TOKEN: string | undefined;
  INPUT_GITHUB_DEPENDENCY_TOKEN: string | undefined;
  INPUT_VERSION_STRATEGY: string | undefined;
  GITHUB_SERVER_URL: string | undefined;
  GITHUB_ACTION: string | undefined;
  GITHUB_WORKSPACE: string | undefined;
};

/**
 * Returns all of the environment variables that this tool uses.
 *
 * @returns An object with a selection of properties from `process.env` that
 * this tool needs to access, whether their values are defined or not.
 */
export function getEnvironmentVariables(): Env {
  return {
    GITHUB_REPOSITORY: process.env.GITHUB_REPOSITORY,
    INPUT_DIRECTORY: process.env.INPUT_DIRECTORY,
    GITHUB_HEAD_REF: process.env.GITHUB_HEAD_REF,
    INPUT_TOKEN: process.env.INPUT_TOKEN,
    INPUT_GITHUB_DEPENDENCY_TOKEN: process.env.INPUT_GITHUB_DEPENDENCY_TOKEN,
    INPUT_VERSION_STRATEGY: process.env.INPUT_VERSION_STRATEGY,
    GITHUB_SERVER_URL: process.env.GITHUB_SERVER_URL,
    GITHUB_ACTION: process.env.GITHUB_ACTION,
    GITHUB_WORKSPACE: process.env.GITHUB_WORKSPACE,
  };
}
