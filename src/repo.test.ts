import { execa } from 'execa';
import which from 'which';
import { AuthenticationError, NetworkError } from './errors.js';
import {
  cloneRepository,
  cloneTagHistory,
  findGitExecutable,
  getCredentialEnvironment,
  getTagsByCreationDate,
  isAuthenticationFailure,
} from './repo.js';
import * as retryModule from './retry.js';
import type { GitSourceCredential } from './types.js';

vitest.mock('execa');
vitest.mock('which');
vitest.mock('./retry');

const CREDENTIALS: GitSourceCredential[] = [
  {
    type: 'git_source',
    host: 'github.com',
    username: 'x-access-token',
    password: 'test-secret',
  },
];

const AUTHORIZATION_HEADER = `Authorization: Basic ${Buffer.from(
  'x-access-token:test-secret',
).toString('base64')}`;

/**
 * Builds an error like the ones `execa` throws when git fails.
 *
 * @param stderr - What git wrote to standard error.
 * @returns The error.
 */
function buildGitError(stderr: string): Error {
  return Object.assign(new Error('Command failed with exit code 128'), {
    stderr,
  });
}

describe('repo', () => {
  beforeEach(async () => {
    const actualRetryModule =
      await vitest.importActual<typeof retryModule>('./retry.js');
    vitest
      .spyOn(retryModule, 'withRetry')
      .mockImplementation(async (description, operation, options) =>
        actualRetryModule.withRetry(description, operation, {
          ...options,
          minTimeout: 0,
        }),
      );
  });

  describe('findGitExecutable', () => {
    it('returns the path to git as found by "which"', async () => {
      vitest
        .mocked(which)
        // Typecast: "which" returns a different type for each of its options
        .mockResolvedValue('/usr/bin/git' as any);

      expect(await findGitExecutable()).toBe('/usr/bin/git');
      expect(which).toHaveBeenCalledWith('git', { nothrow: true });
    });

    it('returns null if git is not installed', async () => {
      vitest
        .mocked(which)
        // Typecast: "which" returns a different type for each of its options
        .mockResolvedValue(null as any);

      expect(await findGitExecutable()).toBeNull();
    });
  });

  describe('isAuthenticationFailure', () => {
    it.each([
      "fatal: Authentication failed for 'https://github.com/example/vpc.git/'",
      "fatal: could not read Username for 'https://github.com': terminal prompts disabled",
      'remote: Invalid username or password.',
      "fatal: unable to access 'https://github.com/example/vpc.git/': The requested URL returned error: 403",
    ])('returns true if git reports "%s"', (stderr) => {
      expect(isAuthenticationFailure(buildGitError(stderr))).toBe(true);
    });

    it('returns false for other git failures', () => {
      expect(
        isAuthenticationFailure(
          buildGitError("fatal: unable to access: Could not resolve host"),
        ),
      ).toBe(false);
    });

    it('returns false for errors without standard error', () => {
      expect(isAuthenticationFailure(new Error('oops'))).toBe(false);
    });

    it('returns false if standard error is not a string', () => {
      expect(
        isAuthenticationFailure(
          Object.assign(new Error('oops'), { stderr: Buffer.from('fatal') }),
        ),
      ).toBe(false);
    });
  });

  describe('getCredentialEnvironment', () => {
    it('returns the git configuration that sends the credentials of the host as a header', () => {
      expect(
        getCredentialEnvironment(
          'https://github.com/example/vpc.git',
          CREDENTIALS,
        ),
      ).toStrictEqual({
        GIT_CONFIG_COUNT: '1',
        GIT_CONFIG_KEY_0: 'http.extraHeader',
        GIT_CONFIG_VALUE_0: AUTHORIZATION_HEADER,
      });
    });

    it('returns nothing if there are no credentials for the host', () => {
      expect(
        getCredentialEnvironment(
          'https://gitlab.example.com/example/vpc.git',
          CREDENTIALS,
        ),
      ).toStrictEqual({});
    });
  });

  describe('cloneRepository', () => {
    it('makes a shallow clone of the given branch, passing the credentials through the environment', async () => {
      await cloneRepository({
        url: 'https://github.com/example/infrastructure.git',
        branch: 'feature',
        destinationPath: '/path/to/clone',
        credentials: CREDENTIALS,
      });

      expect(execa).toHaveBeenCalledWith(
        'git',
        [
          'clone',
          '--depth',
          '1',
          '--quiet',
          '--branch',
          'feature',
          'https://github.com/example/infrastructure.git',
          '/path/to/clone',
        ],
        {
          env: {
            GIT_TERMINAL_PROMPT: '0',
            GIT_CONFIG_COUNT: '1',
            GIT_CONFIG_KEY_0: 'http.extraHeader',
            GIT_CONFIG_VALUE_0: AUTHORIZATION_HEADER,
          },
        },
      );
    });

    it('clones the default branch when no branch is given', async () => {
      await cloneRepository({
        url: 'https://github.com/example/infrastructure.git',
        branch: null,
        destinationPath: '/path/to/clone',
        credentials: [],
      });

      expect(execa).toHaveBeenCalledWith(
        'git',
        [
          'clone',
          '--depth',
          '1',
          '--quiet',
          'https://github.com/example/infrastructure.git',
          '/path/to/clone',
        ],
        { env: { GIT_TERMINAL_PROMPT: '0' } },
      );
    });

    it('throws an AuthenticationError without retrying if the credentials are rejected', async () => {
      vitest
        .mocked(execa)
        .mockRejectedValue(
          buildGitError(
            "fatal: Authentication failed for 'https://github.com/example/infrastructure.git/'",
          ),
        );

      await expect(
        cloneRepository({
          url: 'https://github.com/example/infrastructure.git',
          branch: null,
          destinationPath: '/path/to/clone',
          credentials: CREDENTIALS,
        }),
      ).rejects.toThrow(
        new AuthenticationError(
          'Could not clone https://github.com/example/infrastructure.git: the credentials were rejected',
        ),
      );
      expect(execa).toHaveBeenCalledTimes(1);
    });

    it('throws a NetworkError once the retries are exhausted', async () => {
      vitest
        .mocked(execa)
        .mockRejectedValue(buildGitError('fatal: Could not resolve host'));

      await expect(
        cloneRepository({
          url: 'https://github.com/example/infrastructure.git',
          branch: null,
          destinationPath: '/path/to/clone',
          credentials: CREDENTIALS,
        }),
      ).rejects.toThrow(
        new NetworkError(
          'Could not clone https://github.com/example/infrastructure.git',
        ),
      );
      expect(execa).toHaveBeenCalledTimes(4);
    });
  });

  describe('cloneTagHistory', () => {
    it('makes a bare clone without any trees', async () => {
      await cloneTagHistory({
        url: 'https://github.com/example/vpc.git',
        destinationPath: '/path/to/tags',
        credentials: [],
      });

      expect(execa).toHaveBeenCalledWith(
        'git',
        [
          'clone',
          '--bare',
          '--filter=tree:0',
          '--quiet',
          'https://github.com/example/vpc.git',
          '/path/to/tags',
        ],
        { env: { GIT_TERMINAL_PROMPT: '0' } },
      );
    });
  });

  describe('getTagsByCreationDate', () => {
    it('lists the tags oldest first, peeling annotated tags to their commit', async () => {
      vitest.mocked(execa).mockResolvedValue(
        // Typecast: It's difficult to provide a full return value for execa
        {
          stdout: [
            `v1.0.0\t${'a'.repeat(40)}\t`,
            `v1.1.0\t${'b'.repeat(40)}\t${'c'.repeat(40)}`,
          ].join('\n'),
        } as any,
      );

      expect(await getTagsByCreationDate('/path/to/tags')).toStrictEqual([
        { name: 'v1.0.0', commitSha: 'a'.repeat(40) },
        { name: 'v1.1.0', commitSha: 'c'.repeat(40) },
      ]);
      expect(execa).toHaveBeenCalledWith(
        'git',
        [
          'for-each-ref',
          '--sort=creatordate',
          '--format=%(refname:strip=2)%09%(objectname)%09%(*objectname)',
          'refs/tags',
        ],
        { cwd: '/path/to/tags' },
      );
    });
  });
});
