import fs from 'fs';
import path from 'path';
import { withSandbox } from '../tests/helpers.js';
import {
  readFile,
  writeFile,
  directoryExists,
  listFilesWithExtension,
  ensureDirectoryPathExists,
  createUniqueDirectory,
  removeDirectory,
} from './fs.js';

describe('fs', () => {
  describe('readFile', () => {
    it('reads the contents of the given file as a UTF-8-encoded string', async () => {
      await withSandbox(async (sandbox) => {
        const filePath = path.join(sandbox.directoryPath, 'main.tf');

        await fs.promises.writeFile(filePath, 'some content 😄');

        expect(await readFile(filePath)).toBe('some content 😄');
      });
    });

    it('re-throws any error that occurs as a new error that points to the original', async () => {
      await withSandbox(async (sandbox) => {
        const filePath = path.join(sandbox.directoryPath, 'nonexistent');

        await expect(readFile(filePath)).rejects.toThrow(
          expect.objectContaining({
            message: `Could not read file '${filePath}'`,
            cause: expect.objectContaining({
              message: `ENOENT: no such file or directory, open '${filePath}'`,
            }),
          }),
        );
      });
    });
  });

  describe('writeFile', () => {
    it('writes the given data to the given file', async () => {
      await withSandbox(async (sandbox) => {
        const filePath = path.join(sandbox.directoryPath, 'report.md');

        await writeFile(filePath, 'some content 😄');

        expect(await fs.promises.readFile(filePath, 'utf8')).toBe(
          'some content 😄',
        );
      });
    });

    it('re-throws any error that occurs as a new error that points to the original', async () => {
      await withSandbox(async (sandbox) => {
        const filePath = path.join(sandbox.directoryPath, 'missing', 'report.md');

        await expect(writeFile(filePath, 'content')).rejects.toThrow(
          expect.objectContaining({
            message: `Could not write file '${filePath}'`,
            code: 'ENOENT',
          }),
        );
      });
    });
  });

  describe('directoryExists', () => {
    it('returns true if the given path is a directory', async () => {
      await withSandbox(async (sandbox) => {
        expect(await directoryExists(sandbox.directoryPath)).toBe(true);
      });
    });

    it('returns false if the given path is a file', async () => {
      await withSandbox(async (sandbox) => {
        const filePath = path.join(sandbox.directoryPath, 'main.tf');
        await fs.promises.writeFile(filePath, '');

        expect(await directoryExists(filePath)).toBe(false);
      });
    });

    it('returns false if nothing exists at the given path', async () => {
      await withSandbox(async (sandbox) => {
        expect(
          await directoryExists(path.join(sandbox.directoryPath, 'nonexistent')),
        ).toBe(false);
      });
    });
  });

  describe('listFilesWithExtension', () => {
    it('lists the files with the given extension, sorted, leaving out directories', async () => {
      await withSandbox(async (sandbox) => {
        await fs.promises.writeFile(
          path.join(sandbox.directoryPath, 'variables.tf'),
          '',
        );
        await fs.promises.writeFile(path.join(sandbox.directoryPath, 'main.tf'), '');
        await fs.promises.writeFile(
          path.join(sandbox.directoryPath, 'README.md'),
          '',
        );
        await fs.promises.mkdir(path.join(sandbox.directoryPath, 'modules.tf'));

        expect(
          await listFilesWithExtension(sandbox.directoryPath, '.tf'),
        ).toStrictEqual(['main.tf', 'variables.tf']);
      });
    });

    it('re-throws any error that occurs as a new error that points to the original', async () => {
      await withSandbox(async (sandbox) => {
        const directoryPath = path.join(sandbox.directoryPath, 'nonexistent');

        await expect(
          listFilesWithExtension(directoryPath, '.tf'),
        ).rejects.toThrow(
          expect.objectContaining({
            message: `Could not read directory '${directoryPath}'`,
            code: 'ENOENT',
          }),
        );
      });
    });
  });

  describe('ensureDirectoryPathExists', () => {
    it('creates directories leading up to and including the given path', async () => {
      await withSandbox(async (sandbox) => {
        const directoryPath = path.join(sandbox.directoryPath, 'a', 'b', 'c');

        await ensureDirectoryPathExists(directoryPath);

        expect(await directoryExists(directoryPath)).toBe(true);
      });
    });

    it('does nothing if the given path already exists', async () => {
      await withSandbox(async (sandbox) => {
        await ensureDirectoryPathExists(sandbox.directoryPath);

        expect(await directoryExists(sandbox.directoryPath)).toBe(true);
      });
    });
  });

  describe('createUniqueDirectory', () => {
    it('creates a new directory with the given prefix inside the given parent, creating the parent', async () => {
      await withSandbox(async (sandbox) => {
        const parentDirectoryPath = path.join(sandbox.directoryPath, 'work');

        const firstPath = await createUniqueDirectory(
          parentDirectoryPath,
          'run-',
        );
        const secondPath = await createUniqueDirectory(
          parentDirectoryPath,
          'run-',
        );

        expect(firstPath).not.toBe(secondPath);
        expect(path.dirname(firstPath)).toBe(parentDirectoryPath);
        expect(path.basename(firstPath)).toMatch(/^run-/u);
        expect(await directoryExists(firstPath)).toBe(true);
      });
    });
  });

  describe('removeDirectory', () => {
    it('removes the given directory and everything in it', async () => {
      await withSandbox(async (sandbox) => {
        const directoryPath = path.join(sandbox.directoryPath, 'clone');
        await fs.promises.mkdir(path.join(directoryPath, 'modules'), {
          recursive: true,
        });
        await fs.promises.writeFile(path.join(directoryPath, 'main.tf'), '');

        await removeDirectory(directoryPath);

        expect(await directoryExists(directoryPath)).toBe(false);
      });
    });

    it('does nothing if the directory does not exist', async () => {
      await withSandbox(async (sandbox) => {
        const directoryPath = path.join(sandbox.directoryPath, 'nonexistent');

        expect(await removeDirectory(directoryPath)).toBeUndefined();
      });
    });
  });
});
