import { scanDirectory } from './dependency-scan.js';
import { RepositoryFileFetcher } from './file-fetcher.js';
import { TerraformFileParser } from './file-parser.js';
import { createTagSourceProvider } from './git-tag-source.js';
import { debug } from './misc-utils.js';
import { aggregateUpdateRecords, type Report } from './report.js';
import type { RunConfig } from './run-config.js';
import type { UpdateRecord } from './types.js';
import { UpdateDecisionEngine } from './update-decision-engine.js';
import { getVersionResolutionStrategy } from './version-resolution-strategy.js';

/**
 * Scans every configured directory of the repository, one after another, and
 * merges what was found into a report.
 *
 * @param args - The arguments.
 * @param args.config - The run configuration.
 * @param args.workingDirectoryPath - Where to put the clones made during the
 * run. Not cleaned up here.
 * @returns The report.
 */
export async function checkModuleVersions({
  config,
  workingDirectoryPath,
}: {
  config: RunConfig;
  workingDirectoryPath: string;
}): Promise<Report> {
  const fileFetcher = new RepositoryFileFetcher({
    workingDirectoryPath,
    credentials: config.repositoryCredentials,
  });
  const fileParser = new TerraformFileParser({
    getTagSource: createTagSourceProvider({
      workingDirectoryPath,
      credentials: config.dependencyCredentials,
    }),
  });
  const decisionEngine = new UpdateDecisionEngine({
    strategy: getVersionResolutionStrategy(config.versionStrategy),
  });

  const perDirectoryRecords: UpdateRecord[][] = [];

  for (const directory of config.directories) {
    debug(`Scanning directory '${directory}' of ${config.repository}`);
    perDirectoryRecords.push(
      await scanDirectory({
        location: {
          repository: config.repository,
          directory,
          branch: config.branch,
          host: config.host,
        },
        fileFetcher,
        fileParser,
        decisionEngine,
      }),
    );
  }

  return aggregateUpdateRecords(perDirectoryRecords);
}
