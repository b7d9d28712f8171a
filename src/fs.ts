import fs from 'fs';
import path from 'path';

import { wrapError, isErrorWithCode } from './misc-utils.js';

/**
 * Represents a writeable stream, such as that represented by `process.stdout`
 * or `process.stderr`, or a fake one provided in tests.
 */
export type WriteStreamLike = Pick<fs.WriteStream, 'write'>;

/**
 * Reads the file at the given path, assuming its content is encoded as UTF-8.
 *
 * @param filePath - The path to the file.
 * @returns The content of the file.
 * @throws An error with a stack trace if reading fails in any way.
 */
export async function readFile(filePath: string): Promise<string> {
  try {
    return await fs.promises.readFile(filePath, 'utf8');
  } catch (error) {
    throw wrapError(`Could not read file '${filePath}'`, error);
  }
}

/**
 * Writes content to the file at the given path.
 *
 * @param filePath - The path to the file.
 * @param content - The new content of the file.
 * @throws An error with a stack trace if writing fails in any way.
 */
export async function writeFile(
  filePath: string,
  content: string,
): Promise<void> {
  try {
    await fs.promises.writeFile(filePath, content);
  } catch (error) {
    throw wrapError(`Could not write file '${filePath}'`, error);
  }
}

/**
 * Tests the given path to determine whether it represents a directory.
 *
 * @param entryPath - The path to a directory (or file) on the filesystem.
 * @returns A promise for true if the directory exists or false otherwise.
 * @throws An error with a stack trace if reading fails in any way.
 */
export async function directoryExists(entryPath: string): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(entryPath);
    return stats.isDirectory();
  } catch (error) {
    if (isErrorWithCode(error) && error.code === 'ENOENT') {
      return false;
    }

    throw wrapError(
      `Could not determine if directory exists '${entryPath}'`,
      error,
    );
  }
}

/**
 * Lists the names of the files directly inside the given directory that end
 * with the given extension, sorted.
 *
 * @param directoryPath - The path to the directory.
 * @param extension - The extension, including the leading dot.
 * @returns The file names.
 * @throws An error with a stack trace if reading fails in any way.
 */
export async function listFilesWithExtension(
  directoryPath: string,
  extension: string,
): Promise<string[]> {
  try {
    const entries = await fs.promises.readdir(directoryPath, {
      withFileTypes: true,
    });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(extension))
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    throw wrapError(`Could not read directory '${directoryPath}'`, error);
  }
}

/**
 * Creates the given directory along with any directories leading up to the
 * directory. If the directory already exists, this is a no-op.
 *
 * @param directoryPath - The path to the desired directory.
 * @returns What `fs.promises.mkdir` returns.
 * @throws An error with a stack trace if reading fails in any way.
 */
export async function ensureDirectoryPathExists(
  directoryPath: string,
): Promise<string | undefined> {
  try {
    return await fs.promises.mkdir(directoryPath, { recursive: true });
  } catch (error) {
    throw wrapError(
      `Could not create directory path '${directoryPath}'`,
      error,
    );
  }
}

/**
 * Creates a new, uniquely named directory inside the given parent directory,
 * creating the parent first if needed.
 *
 * @param parentDirectoryPath - The path to the parent directory.
 * @param prefix - The beginning of the name of the new directory.
 * @returns The path to the new directory.
 * @throws An error with a stack trace if creation fails in any way.
 */
export async function createUniqueDirectory(
  parentDirectoryPath: string,
  prefix: string,
): Promise<string> {
  await ensureDirectoryPathExists(parentDirectoryPath);

  try {
    return await fs.promises.mkdtemp(path.join(parentDirectoryPath, prefix));
  } catch (error) {
    throw wrapError(
      `Could not create directory in '${parentDirectoryPath}'`,
      error,
    );
  }
}

/**
 * Removes the given directory and everything in it, if it exists.
 *
 * @param directoryPath - The path to the directory.
 * @throws An error with a stack trace if removal fails in any way.
 */
export async function removeDirectory(directoryPath: string): Promise<void> {
  try {
    await fs.promises.rm(directoryPath, { force: true, recursive: true });
  } catch (error) {
    throw wrapError(`Could not remove directory '${directoryPath}'`, error);
  }
}
