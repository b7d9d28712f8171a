import path from 'path';
import { findModuleDeclarations, isLocalSource } from './file-parser.js';
import {
  createUniqueDirectory,
  directoryExists,
  listFilesWithExtension,
  readFile,
} from './fs.js';
import { debug } from './misc-utils.js';
import { cloneRepository } from './repo.js';
import type {
  DependencyFile,
  GitSourceCredential,
  ProjectLocation,
} from './types.js';

const TERRAFORM_FILE_EXTENSION = '.tf';

/**
 * Fetches the files that declare the dependencies of a project directory.
 */
export type FileFetcher = {
  fetchFiles(location: ProjectLocation): Promise<DependencyFile[]>;
};

/**
 * Builds the HTTPS URL of a repository.
 *
 * @param location - The location of the project.
 * @returns The URL, e.g. `https://github.com/example/infrastructure.git`.
 */
export function getRepositoryUrl({
  host,
  repository,
}: Pick<ProjectLocation, 'host' | 'repository'>): string {
  return `https://${host}/${repository}.git`;
}

/**
 * Fetches Terraform files out of a shallow clone of the scanned repository.
 * The repository is cloned once per branch, however many directories are
 * scanned.
 *
 * Besides the `.tf` files of the directory itself, the `.tf` files of every
 * local module they reference (`source = "./modules/network"`) are fetched as
 * support files, recursively.
 */
export class RepositoryFileFetcher implements FileFetcher {
  readonly workingDirectoryPath: string;

  readonly credentials: readonly GitSourceCredential[];

  readonly #checkouts = new Map<string, Promise<string>>();

  constructor({
    workingDirectoryPath,
    credentials,
  }: {
    workingDirectoryPath: string;
    credentials: readonly GitSourceCredential[];
  }) {
    this.workingDirectoryPath = workingDirectoryPath;
    this.credentials = credentials;
  }

  /**
   * Reads the Terraform files of the given directory and of the local modules
   * it uses.
   *
   * @param location - The location of the project directory.
   * @returns The files, those of the directory itself first. Names are
   * relative to the directory.
   * @throws If the directory does not exist or holds no Terraform files.
   */
  async fetchFiles(location: ProjectLocation): Promise<DependencyFile[]> {
    const checkoutPath = await this.#checkout(location);
    const directoryPath = path.join(checkoutPath, location.directory);

    if (
      isOutside(checkoutPath, directoryPath) ||
      !(await directoryExists(directoryPath))
    ) {
      throw new Error(
        `Directory '${location.directory}' does not exist in ${location.repository}`,
      );
    }

    const files = await readTerraformFiles(directoryPath, directoryPath, false);

    if (files.length === 0) {
      throw new Error(
        `No Terraform configuration files found in directory '${location.directory}'`,
      );
    }

    const visitedDirectoryPaths = new Set([directoryPath]);

    // Support files are appended while iterating, so that the local modules
    // they use are visited as well.
    for (let index = 0; index < files.length; index++) {
      const file = files[index];
      const fileDirectoryPath = path.dirname(path.join(directoryPath, file.name));

      for (const { source } of findModuleDeclarations(file.content)) {
        if (!isLocalSource(source)) {
          continue;
        }

        const moduleDirectoryPath = path.join(fileDirectoryPath, source);

        if (visitedDirectoryPaths.has(moduleDirectoryPath)) {
          continue;
        }

        visitedDirectoryPaths.add(moduleDirectoryPath);

        if (
          isOutside(checkoutPath, moduleDirectoryPath) ||
          !(await directoryExists(moduleDirectoryPath))
        ) {
          debug(`Skipping local module '${source}' in ${file.name}: not found`);
          continue;
        }

        const supportFiles = await readTerraformFiles(
          moduleDirectoryPath,
          directoryPath,
          true,
        );
        files.push(...supportFiles);
      }
    }

    return files;
  }

  async #checkout(location: ProjectLocation): Promise<string> {
    const url = getRepositoryUrl(location);
    const key = `${url}#${location.branch ?? ''}`;
    let checkout = this.#checkouts.get(key);

    if (checkout === undefined) {
      checkout = this.#clone(url, location.branch);
      this.#checkouts.set(key, checkout);
    }

    return await checkout;
  }

  async #clone(url: string, branch: string | null): Promise<string> {
    const destinationPath = await createUniqueDirectory(
      this.workingDirectoryPath,
      'repository-',
    );
    debug(`Cloning ${url}${branch === null ? '' : ` at ${branch}`}`);
    await cloneRepository({
      url,
      branch,
      destinationPath,
      credentials: this.credentials,
    });
    return destinationPath;
  }
}

/**
 * Determines whether a path lies outside of a directory.
 *
 * @param directoryPath - The directory.
 * @param entryPath - The path to test.
 * @returns True or false, depending on the result.
 */
function isOutside(directoryPath: string, entryPath: string): boolean {
  const relativePath = path.relative(directoryPath, entryPath);
  return relativePath.startsWith('..') || path.isAbsolute(relativePath);
}

/**
 * Reads the Terraform files directly inside a directory.
 *
 * @param directoryPath - The directory to read.
 * @param baseDirectoryPath - The directory the file names are relative to.
 * @param supportFile - Whether the files are support files.
 * @returns The files.
 */
async function readTerraformFiles(
  directoryPath: string,
  baseDirectoryPath: string,
  supportFile: boolean,
): Promise<DependencyFile[]> {
  const fileNames = await listFilesWithExtension(
    directoryPath,
    TERRAFORM_FILE_EXTENSION,
  );

  return await Promise.all(
    fileNames.map(async (fileName) => {
      const filePath = path.join(directoryPath, fileName);
      return {
        name: path.relative(baseDirectoryPath, filePath),
        content: await readFile(filePath),
        supportFile,
      };
    }),
  );
}
