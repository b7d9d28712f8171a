import { checkModuleVersions } from './check-module-versions.js';
import type { Env } from './env.js';
import { ConfigurationError } from './errors.js';
import {
  createUniqueDirectory,
  removeDirectory,
  type WriteStreamLike,
} from './fs.js';
import { findGitExecutable } from './repo.js';
import { writeReportFile } from './report.js';
import { determineRunConfig, type RunConfig } from './run-config.js';

/**
 * The exit codes of this tool.
 */
export const EXIT_CODES = {
  upToDate: 0,
  updatesAvailable: 1,
  configurationError: 2,
} as const;

/**
 * Builds the run configuration and makes sure that `git` can be run.
 *
 * @param args - The arguments.
 * @param args.argv - The arguments to this executable.
 * @param args.env - The environment variables this tool uses.
 * @param args.cwd - The directory in which this executable was run.
 * @returns The run configuration.
 * @throws ConfigurationError if anything needed for the run is missing.
 */
async function prepareRun(args: {
  argv: string[];
  env: Env;
  cwd: string;
}): Promise<RunConfig> {
  const config = await determineRunConfig(args);

  if ((await findGitExecutable()) === null) {
    throw new ConfigurationError('git needs to be installed');
  }

  return config;
}

/**
 * The main function for this tool. Designed to not access `process.argv`,
 * `process.env`, `process.cwd()`, `process.stdout`, or `process.stderr`
 * directly so as to be more easily testable.
 *
 * @param args - The arguments.
 * @param args.argv - The name of this executable and its arguments (as obtained
 * via `process.argv`).
 * @param args.env - The environment variables this tool uses.
 * @param args.cwd - The directory in which this executable was run.
 * @param args.stdout - A stream that can be used to write to standard out.
 * @param args.stderr - A stream that can be used to write to standard error.
 * @returns The exit code.
 */
export async function main({
  argv,
  env,
  cwd,
  stdout,
  stderr,
}: {
  argv: string[];
  env: Env;
  cwd: string;
  stdout: WriteStreamLike;
  stderr: WriteStreamLike;
}): Promise<number> {
  let config: RunConfig;

  try {
    config = await prepareRun({ argv, env, cwd });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      stderr.write(`${error.message}\n`);
      return EXIT_CODES.configurationError;
    }

    throw error;
  }

  const workingDirectoryPath = await createUniqueDirectory(
    config.tempDirectoryPath,
    'run-',
  );

  try {
    const report = await checkModuleVersions({ config, workingDirectoryPath });
    await writeReportFile(config.reportFilePath, report);
    stdout.write(`${report.renderedReport}\n`);

    return report.hasUpdates
      ? EXIT_CODES.updatesAvailable
      : EXIT_CODES.upToDate;
  } finally {
    await removeDirectory(workingDirectoryPath);
  }
}
