import type { FileFetcher } from './file-fetcher.js';
import type { FileParser } from './file-parser.js';
import { debug, wrapError } from './misc-utils.js';
import type { Dependency, ProjectLocation, UpdateRecord } from './types.js';
import type {
  DecisionOutcome,
  UpdateDecisionEngine,
} from './update-decision-engine.js';

/**
 * Looks for outdated modules in one directory of the repository.
 *
 * Only top-level dependencies are checked. Every requirement of every
 * dependency changed by an update yields one record; records come out in the
 * order the dependencies were declared.
 *
 * @param args - The arguments.
 * @param args.location - The directory to scan.
 * @param args.fileFetcher - Fetches the files of the directory.
 * @param args.fileParser - Reads the dependencies out of those files.
 * @param args.decisionEngine - Decides what to do about each dependency.
 * @returns The update records.
 * @throws If the directory cannot be read, or if the tags of one of its
 * modules cannot be resolved. The error names the directory or module.
 */
export async function scanDirectory({
  location,
  fileFetcher,
  fileParser,
  decisionEngine,
}: {
  location: ProjectLocation;
  fileFetcher: FileFetcher;
  fileParser: FileParser;
  decisionEngine: UpdateDecisionEngine;
}): Promise<UpdateRecord[]> {
  let dependencies: Dependency[];

  try {
    const files = await fileFetcher.fetchFiles(location);
    dependencies = await fileParser.parse(files);
  } catch (error) {
    throw wrapError(
      `Could not read the modules of directory '${location.directory}'`,
      error,
    );
  }

  const topLevelDependencies = dependencies.filter(
    (dependency) => dependency.topLevel,
  );
  debug(
    `Checking ${topLevelDependencies.length} module(s) in '${location.directory}'`,
  );

  const records: UpdateRecord[] = [];

  for (const dependency of topLevelDependencies) {
    let outcome: DecisionOutcome;

    try {
      outcome = await decisionEngine.decide(dependency);
    } catch (error) {
      throw wrapError(
        `Could not check module '${dependency.name}' in directory '${location.directory}'`,
        error,
      );
    }

    if (outcome.kind !== 'update') {
      continue;
    }

    for (const updatedDependency of outcome.updatedDependencies) {
      for (const requirement of updatedDependency.requirements) {
        records.push({
          directory: location.directory,
          file: requirement.file,
          moduleUrl: requirement.declaredSource.url,
          previousVersion: updatedDependency.previousVersion,
          newVersion: updatedDependency.newVersion,
        });
      }
    }
  }

  return records;
}
