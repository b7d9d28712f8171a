import { createUniqueDirectory, removeDirectory } from './fs.js';
import { debug } from './misc-utils.js';
import { cloneTagHistory, getTagsByCreationDate } from './repo.js';
import type { GitSourceCredential, GitTagSource, Tag } from './types.js';
import { isVersionTagName } from './version.js';

/**
 * Reads the tags of a remote git repository. The tags are fetched once, on
 * first use.
 */
export class RemoteGitTagSource implements GitTagSource {
  readonly url: string;

  readonly workingDirectoryPath: string;

  readonly credentials: readonly GitSourceCredential[];

  #tags: Promise<Tag[]> | undefined;

  constructor({
    url,
    workingDirectoryPath,
    credentials,
  }: {
    url: string;
    workingDirectoryPath: string;
    credentials: readonly GitSourceCredential[];
  }) {
    this.url = url;
    this.workingDirectoryPath = workingDirectoryPath;
    this.credentials = credentials;
  }

  /**
   * Lists the tags of the repository whose names carry a version, oldest
   * first. `pushOrder` is the position of the tag among all tags, including
   * the ones filtered out.
   *
   * @returns The version tags.
   */
  async allowedVersionTags(): Promise<Tag[]> {
    if (this.#tags === undefined) {
      this.#tags = this.#fetchTags();
    }

    return await this.#tags;
  }

  async #fetchTags(): Promise<Tag[]> {
    const destinationPath = await createUniqueDirectory(
      this.workingDirectoryPath,
      'tags-',
    );

    try {
      await cloneTagHistory({
        url: this.url,
        destinationPath,
        credentials: this.credentials,
      });
      const tagRefs = await getTagsByCreationDate(destinationPath);
      debug(`Found ${tagRefs.length} tag(s) for ${this.url}`);

      return tagRefs
        .map(({ name, commitSha }, pushOrder) => ({
          name,
          commitSha,
          pushOrder,
        }))
        .filter((tag) => isVersionTagName(tag.name));
    } finally {
      await removeDirectory(destinationPath);
    }
  }
}

/**
 * Builds a function that hands out one tag source per module URL, so that the
 * tags of a module are fetched at most once per run however often it is
 * declared.
 *
 * @param args - The arguments.
 * @param args.workingDirectoryPath - Where to put temporary clones.
 * @param args.credentials - The credentials for fetching module tags.
 * @returns The function.
 */
export function createTagSourceProvider({
  workingDirectoryPath,
  credentials,
}: {
  workingDirectoryPath: string;
  credentials: readonly GitSourceCredential[];
}): (url: string) => GitTagSource {
  const tagSourcesByUrl = new Map<string, GitTagSource>();

  return (url) => {
    let tagSource = tagSourcesByUrl.get(url);

    if (tagSource === undefined) {
      tagSource = new RemoteGitTagSource({
        url,
        workingDirectoryPath,
        credentials,
      });
      tagSourcesByUrl.set(url, tagSource);
    }

    return tagSource;
  };
}
