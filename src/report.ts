import { writeFile } from './fs.js';
import type { UpdateRecord } from './types.js';

/**
 * The name of the file the report is written to.
 */
export const REPORT_FILE_NAME = 'terraform-module-versions-action.md';

const REPORT_HEADING = '## Terraform Module Versions Check Results';

/**
 * The outcome of a whole run.
 */
export type Report = {
  renderedReport: string;
  hasUpdates: boolean;
};

/**
 * Renders one line of the report.
 *
 * @param record - The update record.
 * @returns The line, e.g. `File infra/main.tf needs module
 * https://github.com/example/vpc.git updated from 1.0.0 to 1.1.0`. The
 * directory is rendered as configured, so `/` gives `File //main.tf`.
 */
export function formatUpdateRecord({
  directory,
  file,
  moduleUrl,
  previousVersion,
  newVersion,
}: UpdateRecord): string {
  return `File ${directory}/${file} needs module ${moduleUrl} updated from ${previousVersion} to ${newVersion}`;
}

/**
 * Merges the update records of every scanned directory into the report.
 * Records rendering to the same line are listed once, and lines are sorted by
 * code unit so that the output does not depend on the order of the scans.
 *
 * @param perDirectoryRecords - The records of each directory.
 * @returns The report.
 */
export function aggregateUpdateRecords(
  perDirectoryRecords: readonly (readonly UpdateRecord[])[],
): Report {
  const lines = new Set<string>();

  for (const records of perDirectoryRecords) {
    for (const record of records) {
      lines.add(formatUpdateRecord(record));
    }
  }

  if (lines.size === 0) {
    return {
      renderedReport: '**All modules are up to date**',
      hasUpdates: false,
    };
  }

  return {
    renderedReport: ['**Modules are not up to date**', ...[...lines].sort()].join(
      '\n',
    ),
    hasUpdates: true,
  };
}

/**
 * Writes the report, under a heading, to the given file.
 *
 * @param filePath - The path to the report file.
 * @param report - The report.
 */
export async function writeReportFile(
  filePath: string,
  { renderedReport }: Report,
): Promise<void> {
  await writeFile(filePath, `${REPORT_HEADING}\n${renderedReport}\n`);
}
