import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { VERSION_STRATEGY_NAMES } from './version-resolution-strategy.js';

/**
 * The options given on the command line. Each one, when present, takes
 * precedence over the environment variable for the same input.
 */
export type CommandLineArguments = {
  repository?: string;
  directory?: string;
  branch?: string;
  token?: string;
  dependencyToken?: string;
  versionStrategy?: string;
  tempDirectory?: string;
};

/**
 * Parses the arguments provided on the command line using `yargs`.
 *
 * @param argv - The name of this executable and its arguments (as obtained via
 * `process.argv`).
 * @returns A promise for the parsed arguments.
 */
export async function readCommandLineArguments(
  argv: string[],
): Promise<CommandLineArguments> {
  const args = await yargs(hideBin(argv))
    .scriptName('terraform-module-versions')
    .usage('$0 [options]')
    .option('repository', {
      alias: 'r',
      describe: 'The repository to scan, as `owner/name`.',
      type: 'string',
    })
    .option('directory', {
      alias: 'd',
      describe:
        'The directories to scan, separated by newlines. Defaults to the root of the repository.',
      type: 'string',
    })
    .option('branch', {
      alias: 'b',
      describe: 'The branch to scan instead of the default branch.',
      type: 'string',
    })
    .option('token', {
      describe: 'The token used to clone the repository.',
      type: 'string',
    })
    .option('dependency-token', {
      describe:
        'The token used to read the tags of module repositories, if different.',
      type: 'string',
    })
    .option('version-strategy', {
      describe: `How the latest version of a module is picked: one of ${VERSION_STRATEGY_NAMES.join(
        ', ',
      )}.`,
      type: 'string',
    })
    .option('temp-directory', {
      describe: 'The directory that is used to hold temporary clones.',
      type: 'string',
    })
    .help()
    .strict()
    .parse();

  return {
    repository: args.repository,
    directory: args.directory,
    branch: args.branch,
    token: args.token,
    dependencyToken: args.dependencyToken,
    versionStrategy: args.versionStrategy,
    tempDirectory: args.tempDirectory,
  };
}
