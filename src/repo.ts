import { execa, type Options } from 'execa';
import which from 'which';
import { AuthenticationError, NetworkError } from './errors.js';
import { withRetry } from './retry.js';
import type { GitSourceCredential } from './types.js';

/**
 * Messages with which git reports that a host rejected (or asked for)
 * credentials.
 */
const AUTHENTICATION_FAILURE_PATTERNS = [
  /Authentication failed/u,
  /could not read Username/u,
  /Invalid username or password/u,
  /The requested URL returned error: 40[13]/u,
];

/**
 * A tag as listed by git, before any filtering.
 */
export type GitTagRef = {
  name: string;
  commitSha: string;
};

/**
 * Looks up the `git` executable on the `PATH`.
 *
 * @returns The path to `git`, or null if it is not installed.
 */
export async function findGitExecutable(): Promise<string | null> {
  return await which('git', { nothrow: true });
}

/**
 * Runs git, discarding its output.
 *
 * @param commandArgs - The arguments to git.
 * @param options - The options to `execa`.
 * @throws An `execa` error object if git fails.
 */
async function runGit(
  commandArgs: readonly string[],
  options: Options,
): Promise<void> {
  await execa('git', commandArgs, options);
}

/**
 * Runs git, returning the non-empty lines of its output.
 *
 * @param commandArgs - The arguments to git.
 * @param options - The options to `execa`.
 * @returns The lines.
 * @throws An `execa` error object if git fails.
 */
async function getGitOutputLines(
  commandArgs: readonly string[],
  options: Options,
): Promise<string[]> {
  const { stdout } = await execa('git', commandArgs, options);
  return stdout.split('\n').filter((line) => line !== '');
}

/**
 * Determines whether the given error is a git failure caused by missing or
 * rejected credentials. Such failures are never retried.
 *
 * @param error - The error thrown by `execa`.
 * @returns True or false, depending on the result.
 */
export function isAuthenticationFailure(error: unknown): boolean {
  if (
    typeof error !== 'object' ||
    error === null ||
    !('stderr' in error) ||
    typeof error.stderr !== 'string'
  ) {
    return false;
  }

  const stderr = error.stderr;
  return AUTHENTICATION_FAILURE_PATTERNS.some((pattern) =>
    pattern.test(stderr),
  );
}

/**
 * Builds the environment variables that make git send the credentials for the
 * host of the given URL, if there are any. The header is passed through the
 * environment so that it never shows up in a command line or an error message.
 *
 * @param url - The HTTPS URL of the remote repository.
 * @param credentials - The credentials available.
 * @returns The environment variables to add.
 */
export function getCredentialEnvironment(
  url: string,
  credentials: readonly GitSourceCredential[],
): Record<string, string> {
  const { host } = new URL(url);
  const credential = credentials.find(
    (candidate) => candidate.type === 'git_source' && candidate.host === host,
  );

  if (credential === undefined) {
    return {};
  }

  const token = Buffer.from(
    `${credential.username}:${credential.password}`,
  ).toString('base64');

  return {
    GIT_CONFIG_COUNT: '1',
    GIT_CONFIG_KEY_0: 'http.extraHeader',
    GIT_CONFIG_VALUE_0: `Authorization: Basic ${token}`,
  };
}

/**
 * Runs a git command that talks to a remote, retrying transient failures.
 *
 * @param description - What the command does, used in error messages.
 * @param commandArgs - The arguments to git.
 * @param options - The options to `execa`.
 * @throws AuthenticationError if the host rejects the credentials.
 * @throws NetworkError if the command keeps failing.
 */
async function runRemoteGitCommand(
  description: string,
  commandArgs: readonly string[],
  options: Options,
): Promise<void> {
  try {
    await withRetry(description, () => runGit(commandArgs, options), {
      shouldRetry: (error) => !isAuthenticationFailure(error),
    });
  } catch (error) {
    if (isAuthenticationFailure(error)) {
      throw new AuthenticationError(
        `Could not ${description}: the credentials were rejected`,
        { cause: error },
      );
    }

    throw new NetworkError(`Could not ${description}`, { cause: error });
  }
}

/**
 * Makes a shallow clone of the given repository, holding only the latest
 * commit of the given branch (or of the default branch).
 *
 * @param args - The arguments.
 * @param args.url - The HTTPS URL of the repository.
 * @param args.branch - The branch to check out, or null for the default one.
 * @param args.destinationPath - Where to put the clone.
 * @param args.credentials - The credentials available for the host.
 */
export async function cloneRepository({
  url,
  branch,
  destinationPath,
  credentials,
}: {
  url: string;
  branch: string | null;
  destinationPath: string;
  credentials: readonly GitSourceCredential[];
}): Promise<void> {
  await runRemoteGitCommand(
    `clone ${url}`,
    [
      'clone',
      '--depth',
      '1',
      '--quiet',
      ...(branch === null ? [] : ['--branch', branch]),
      url,
      destinationPath,
    ],
    {
      env: {
        GIT_TERMINAL_PROMPT: '0',
        ...getCredentialEnvironment(url, credentials),
      },
    },
  );
}

/**
 * Makes a bare clone of the given repository that holds its commits and tags
 * but none of its files, which is enough to order its tags by date.
 *
 * @param args - The arguments.
 * @param args.url - The HTTPS URL of the repository.
 * @param args.destinationPath - Where to put the clone.
 * @param args.credentials - The credentials available for the host.
 */
export async function cloneTagHistory({
  url,
  destinationPath,
  credentials,
}: {
  url: string;
  destinationPath: string;
  credentials: readonly GitSourceCredential[];
}): Promise<void> {
  await runRemoteGitCommand(
    `fetch the tags of ${url}`,
    ['clone', '--bare', '--filter=tree:0', '--quiet', url, destinationPath],
    {
      env: {
        GIT_TERMINAL_PROMPT: '0',
        ...getCredentialEnvironment(url, credentials),
      },
    },
  );
}

/**
 * Lists the tags of the given repository in the order they were created,
 * oldest first. Annotated tags are peeled to the commit they point to.
 *
 * @param repositoryDirectoryPath - The path to the (possibly bare) repository.
 * @returns The tags.
 * @throws An execa error object if the command fails in some way.
 */
export async function getTagsByCreationDate(
  repositoryDirectoryPath: string,
): Promise<GitTagRef[]> {
  const lines = await getGitOutputLines(
    [
      'for-each-ref',
      '--sort=creatordate',
      '--format=%(refname:strip=2)%09%(objectname)%09%(*objectname)',
      'refs/tags',
    ],
    { cwd: repositoryDirectoryPath },
  );

  return lines.map((line) => {
    const [name = '', objectSha = '', peeledSha = ''] = line.split('\t');
    return { name, commitSha: peeledSha === '' ? objectSha : peeledSha };
  });
}
