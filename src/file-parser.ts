import { debug } from './misc-utils.js';
import type {
  Dependency,
  DependencyFile,
  GitTagSource,
  UnlockLevel,
} from './types.js';
import { isVersionTagName, ResolvedVersion } from './version.js';

const COMMIT_SHA_REGEX = /^[0-9a-f]{40}$/iu;

/**
 * A `module` block found in a Terraform file.
 */
export type ModuleDeclaration = {
  name: string;
  source: string;
};

/**
 * Where a git-sourced module comes from. `url` is an HTTPS URL without any
 * subdirectory or query string.
 */
export type GitModuleSource = {
  url: string;
  ref: string | null;
};

/**
 * Turns Terraform files into the dependencies they declare.
 */
export type FileParser = {
  parse(files: readonly DependencyFile[]): Promise<Dependency[]>;
};

/**
 * Finds the index just past the end of the double-quoted string that starts at
 * the given index.
 *
 * @param content - The content being scanned.
 * @param startIndex - The index of the opening quote.
 * @returns The index after the closing quote.
 */
function skipString(content: string, startIndex: number): number {
  let index = startIndex + 1;

  while (index < content.length && content[index] !== '"') {
    index += content[index] === '\\' ? 2 : 1;
  }

  return index + 1;
}

/**
 * Blanks out the comments (`#`, `//` and `/* *\/`) in HCL content, keeping
 * strings intact and every other character where it was.
 *
 * @param content - The HCL content.
 * @returns The content without comments.
 */
export function stripComments(content: string): string {
  let result = '';
  let index = 0;

  while (index < content.length) {
    const character = content[index];
    const next = content[index + 1];

    if (character === '"') {
      const endIndex = skipString(content, index);
      result += content.slice(index, endIndex);
      index = endIndex;
    } else if (character === '#' || (character === '/' && next === '/')) {
      const newlineIndex = content.indexOf('\n', index);
      index = newlineIndex === -1 ? content.length : newlineIndex;
    } else if (character === '/' && next === '*') {
      const closingIndex = content.indexOf('*/', index + 2);
      const endIndex =
        closingIndex === -1 ? content.length : closingIndex + 2;
      result += content.slice(index, endIndex).replace(/[^\n]/gu, ' ');
      index = endIndex;
    } else {
      result += character;
      index += 1;
    }
  }

  return result;
}

/**
 * Finds the index of the brace closing the block whose opening brace is at the
 * given index.
 *
 * @param content - The content being scanned, without comments.
 * @param openingIndex - The index of the opening brace.
 * @returns The index of the closing brace, or -1 if the block never closes.
 */
function findClosingBrace(content: string, openingIndex: number): number {
  let depth = 0;
  let index = openingIndex;

  while (index < content.length) {
    const character = content[index];

    if (character === '"') {
      index = skipString(content, index);
      continue;
    }

    if (character === '{') {
      depth += 1;
    } else if (character === '}') {
      depth -= 1;

      if (depth === 0) {
        return index;
      }
    }

    index += 1;
  }

  return -1;
}

/**
 * Lists the `module` blocks of a Terraform file along with their `source`.
 * Blocks without a literal `source` are left out.
 *
 * @param content - The content of a `.tf` file.
 * @returns The module declarations, in order of appearance.
 */
export function findModuleDeclarations(content: string): ModuleDeclaration[] {
  const strippedContent = stripComments(content);
  const declarations: ModuleDeclaration[] = [];
  const moduleHeaderRegex = /(?:^|\s)module\s+"([^"]+)"\s*\{/gu;
  let match: RegExpExecArray | null;

  while ((match = moduleHeaderRegex.exec(strippedContent)) !== null) {
    const [header, name] = match;
    const openingIndex = match.index + header.length - 1;
    const closingIndex = findClosingBrace(strippedContent, openingIndex);

    if (closingIndex === -1) {
      break;
    }

    const body = strippedContent.slice(openingIndex + 1, closingIndex);
    const source = body.match(/^\s*source\s*=\s*"([^"]*)"/mu)?.[1];

    if (source !== undefined) {
      declarations.push({ name, source });
    }

    moduleHeaderRegex.lastIndex = closingIndex + 1;
  }

  return declarations;
}

/**
 * Determines whether a module source points to a directory of the same
 * repository.
 *
 * @param source - The value of the `source` attribute.
 * @returns True or false, depending on the result.
 */
export function isLocalSource(source: string): boolean {
  return source.startsWith('./') || source.startsWith('../');
}

/**
 * Rewrites a git address (HTTPS, `ssh://` or scp-like `git@host:path`) as an
 * HTTPS URL.
 *
 * @param address - The address, without subdirectory or query string.
 * @returns The HTTPS URL, or null if the address is not recognized.
 */
function toHttpsUrl(address: string): string | null {
  if (/^https?:\/\//u.test(address)) {
    return address;
  }

  const sshMatch = address.match(/^ssh:\/\/(?:[^@/]+@)?([^/:]+)(?::\d+)?\/(.+)$/u);

  if (sshMatch) {
    return `https://${sshMatch[1]}/${sshMatch[2]}`;
  }

  const scpMatch = address.match(/^(?:[^@/]+@)?([^:/]+):(.+)$/u);

  if (scpMatch) {
    return `https://${scpMatch[1]}/${scpMatch[2]}`;
  }

  return null;
}

/**
 * Parses the `source` of a module when it points to a git repository. The
 * forms recognized are those Terraform itself accepts:
 *
 * - `git::<address>`, e.g. `git::https://example.com/vpc.git?ref=v1.2.0`
 * - `github.com/<owner>/<name>` and `bitbucket.org/<owner>/<name>`
 * - `git@<host>:<path>`
 *
 * @param source - The value of the `source` attribute.
 * @returns The URL and ref of the repository, or null if the source is not
 * a git source.
 */
export function parseGitSource(source: string): GitModuleSource | null {
  let address = source.trim();

  if (address.startsWith('git::')) {
    address = address.slice('git::'.length);
  } else if (/^(?:github\.com|bitbucket\.org)\//u.test(address)) {
    address = `https://${address}`;
  } else if (!address.startsWith('git@')) {
    return null;
  }

  const queryIndex = address.indexOf('?');
  const query = queryIndex === -1 ? '' : address.slice(queryIndex + 1);
  let location = queryIndex === -1 ? address : address.slice(0, queryIndex);

  const schemeIndex = location.indexOf('://');
  const subdirectoryIndex = location.indexOf(
    '//',
    schemeIndex === -1 ? 0 : schemeIndex + 3,
  );

  if (subdirectoryIndex !== -1) {
    location = location.slice(0, subdirectoryIndex);
  }

  const url = toHttpsUrl(location);

  if (url === null) {
    return null;
  }

  return { url, ref: new URLSearchParams(query).get('ref') };
}

/**
 * Derives the name of a module from the URL of its repository, e.g.
 * `github.com/example/vpc` for `https://github.com/example/vpc.git`.
 *
 * @param url - The HTTPS URL of the repository.
 * @returns The name.
 */
export function getModuleName(url: string): string {
  return url.replace(/^https?:\/\//u, '').replace(/\.git$/u, '');
}

/**
 * Reads the git-sourced modules declared in Terraform files.
 *
 * A module declared with the same URL and ref in several places becomes one
 * dependency with several requirements. It is top-level when at least one of
 * those places is a file of the scanned directory itself.
 *
 * Modules pinned to a version tag may have that tag rewritten. Modules pinned
 * to a commit take the version of the tag pointing at that commit and are not
 * rewritten. Anything else is skipped.
 */
export class TerraformFileParser implements FileParser {
  readonly getTagSource: (url: string) => GitTagSource;

  constructor({
    getTagSource,
  }: {
    getTagSource: (url: string) => GitTagSource;
  }) {
    this.getTagSource = getTagSource;
  }

  async parse(files: readonly DependencyFile[]): Promise<Dependency[]> {
    const dependenciesByKey = new Map<string, Dependency>();

    for (const file of files) {
      for (const declaration of findModuleDeclarations(file.content)) {
        const gitSource = parseGitSource(declaration.source);

        if (gitSource === null) {
          debug(
            `Skipping module "${declaration.name}" in ${file.name}: not a git source`,
          );
          continue;
        }

        const { url, ref } = gitSource;

        if (ref === null) {
          debug(
            `Skipping module "${declaration.name}" in ${file.name}: no ref to compare`,
          );
          continue;
        }

        const key = `${url}@${ref}`;
        const existingDependency = dependenciesByKey.get(key);

        if (existingDependency !== undefined) {
          existingDependency.requirements.push({
            file: file.name,
            declaredSource: { url, ref },
            unlockLevel: existingDependency.requirements[0].unlockLevel,
          });
          existingDependency.topLevel ||= !file.supportFile;
          continue;
        }

        const currentState = await this.#resolveCurrentState(url, ref);

        if (currentState === null) {
          debug(
            `Skipping module "${declaration.name}" in ${file.name}: ref '${ref}' is not a version`,
          );
          continue;
        }

        dependenciesByKey.set(key, {
          name: getModuleName(url),
          currentVersion: currentState.currentVersion,
          requirements: [
            {
              file: file.name,
              declaredSource: { url, ref },
              unlockLevel: currentState.unlockLevel,
            },
          ],
          topLevel: !file.supportFile,
          tagSource: this.getTagSource(url),
        });
      }
    }

    return [...dependenciesByKey.values()];
  }

  async #resolveCurrentState(
    url: string,
    ref: string,
  ): Promise<{
    currentVersion: ResolvedVersion;
    unlockLevel: UnlockLevel;
  } | null> {
    if (isVersionTagName(ref)) {
      return {
        currentVersion: ResolvedVersion.fromTagName(ref),
        unlockLevel: 'own',
      };
    }

    if (COMMIT_SHA_REGEX.test(ref)) {
      const commitSha = ref.toLowerCase();
      const tags = await this.getTagSource(url).allowedVersionTags();
      const matchingTag = tags
        .filter((tag) => tag.commitSha === commitSha)
        .pop();

      if (matchingTag !== undefined) {
        return {
          currentVersion: ResolvedVersion.fromTagName(matchingTag.name),
          unlockLevel: 'none',
        };
      }
    }

    return null;
  }
}
