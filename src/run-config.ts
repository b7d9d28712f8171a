import os from 'os';
import path from 'path';
import { readCommandLineArguments } from './command-line-arguments.js';
import type { Env } from './env.js';
import { ConfigurationError } from './errors.js';
import { isTruthyString } from './misc-utils.js';
import { REPORT_FILE_NAME } from './report.js';
import type { GitSourceCredential } from './types.js';
import {
  VERSION_STRATEGY_NAMES,
  type VersionStrategyName,
} from './version-resolution-strategy.js';

const DEFAULT_HOST = 'github.com';

const DEFAULT_DIRECTORY = '/';

const DEFAULT_VERSION_STRATEGY: VersionStrategyName = 'most-recent-tag';

/**
 * Everything a run needs to know, gathered from the command line and the
 * environment before anything is fetched.
 */
export type RunConfig = Readonly<{
  repository: string;
  directories: readonly string[];
  branch: string | null;
  host: string;
  repositoryCredentials: readonly GitSourceCredential[];
  dependencyCredentials: readonly GitSourceCredential[];
  versionStrategy: VersionStrategyName;
  reportFilePath: string;
  tempDirectoryPath: string;
}>;

/**
 * Splits the list of directories to scan. Directories are separated by
 * newlines, or by a literal `\n` for inputs that cannot hold one. Blank entries
 * are dropped.
 *
 * @param value - The list of directories.
 * @returns The directories.
 */
export function parseDirectoryList(value: string): string[] {
  return value
    .replace(/\\n/gu, '\n')
    .split('\n')
    .map((directory) => directory.trim())
    .filter((directory) => directory !== '');
}

/**
 * Builds the credentials for a git host out of a token.
 *
 * @param host - The git host.
 * @param token - The token.
 * @returns The credentials.
 */
function buildCredential(host: string, token: string): GitSourceCredential {
  return {
    type: 'git_source',
    host,
    username: 'x-access-token',
    password: token,
  };
}

/**
 * Determines the host of the repository.
 *
 * @param serverUrl - The URL of the git server, if any.
 * @returns The host, e.g. `github.com`.
 * @throws ConfigurationError if the URL cannot be parsed.
 */
function determineHost(serverUrl: string | undefined): string {
  if (!isTruthyString(serverUrl)) {
    return DEFAULT_HOST;
  }

  try {
    return new URL(serverUrl).host;
  } catch {
    throw new ConfigurationError(
      `GITHUB_SERVER_URL '${serverUrl}' is not a valid URL`,
    );
  }
}

/**
 * Determines the strategy used to pick the latest version of a module.
 *
 * @param value - The name given, if any.
 * @returns The name of the strategy.
 * @throws ConfigurationError if no strategy goes by that name.
 */
function determineVersionStrategy(
  value: string | undefined,
): VersionStrategyName {
  if (!isTruthyString(value)) {
    return DEFAULT_VERSION_STRATEGY;
  }

  const versionStrategy = VERSION_STRATEGY_NAMES.find(
    (name) => name === value,
  );

  if (versionStrategy === undefined) {
    throw new ConfigurationError(
      `The version strategy needs to be one of ${VERSION_STRATEGY_NAMES.join(
        ', ',
      )}, got '${value}'`,
    );
  }

  return versionStrategy;
}

/**
 * Reads the inputs given to this tool via the command line and the environment
 * and turns them into the configuration of a run. Command-line options take
 * precedence over environment variables.
 *
 * @param args - The arguments to this function.
 * @param args.argv - The arguments to this executable.
 * @param args.env - The environment variables this tool uses.
 * @param args.cwd - The directory in which this executable was run.
 * @returns The run configuration.
 * @throws ConfigurationError if a required input is missing or invalid.
 */
export async function determineRunConfig({
  argv,
  env,
  cwd,
}: {
  argv: string[];
  env: Env;
  cwd: string;
}): Promise<RunConfig> {
  const args = await readCommandLineArguments(argv);

  const repository = args.repository ?? env.GITHUB_REPOSITORY;

  if (!isTruthyString(repository)) {
    throw new ConfigurationError('GITHUB_REPOSITORY needs to be set');
  }

  const directories = parseDirectoryList(
    args.directory ?? env.INPUT_DIRECTORY ?? DEFAULT_DIRECTORY,
  );

  if (directories.length === 0) {
    throw new ConfigurationError('The directory needs to be set');
  }

  const token = args.token ?? env.INPUT_TOKEN;

  if (!isTruthyString(token)) {
    throw new ConfigurationError('A GitHub token needs to be provided');
  }

  const branch = args.branch ?? env.GITHUB_HEAD_REF;
  const host = determineHost(env.GITHUB_SERVER_URL);
  const dependencyToken =
    args.dependencyToken ?? env.INPUT_GITHUB_DEPENDENCY_TOKEN;
  const dependencyCredentials: GitSourceCredential[] = isTruthyString(
    dependencyToken,
  )
    ? [buildCredential(host, dependencyToken)]
    : [];
  const reportDirectoryPath = isTruthyString(env.GITHUB_ACTION)
    ? env.GITHUB_WORKSPACE ?? cwd
    : cwd;

  return Object.freeze({
    repository,
    directories: Object.freeze(directories),
    branch: isTruthyString(branch) ? branch : null,
    host,
    repositoryCredentials: Object.freeze([buildCredential(host, token)]),
    dependencyCredentials: Object.freeze(dependencyCredentials),
    versionStrategy: determineVersionStrategy(
      args.versionStrategy ?? env.INPUT_VERSION_STRATEGY,
    ),
    reportFilePath: path.join(reportDirectoryPath, REPORT_FILE_NAME),
    tempDirectoryPath:
      args.tempDirectory === undefined
        ? path.join(os.tmpdir(), 'terraform-module-versions')
        : path.resolve(cwd, args.tempDirectory),
  });
}
