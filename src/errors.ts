import { ErrorWithCause } from 'pony-cause';

/**
 * Thrown when a required input to this tool is missing or invalid. Raised
 * before anything is fetched, and reported as a single line.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when the tag history of a module cannot be turned into a version.
 * This is a failure of the whole run, not merely the absence of an update.
 */
export class TagResolutionError extends ErrorWithCause<unknown> {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = 'TagResolutionError';
  }
}

/**
 * Thrown when a module has no tags matching the version tag pattern.
 */
export class NoEligibleTagError extends TagResolutionError {
  constructor(message = 'No tag matching the version tag pattern was found') {
    super(message);
    this.name = 'NoEligibleTagError';
  }
}

/**
 * Thrown when a tag that should carry a version has no version substring.
 */
export class MalformedTagError extends TagResolutionError {
  readonly tagName: string;

  constructor(tagName: string) {
    super(`Tag '${tagName}' does not contain a version`);
    this.name = 'MalformedTagError';
    this.tagName = tagName;
  }
}

/**
 * Thrown when a network-bound git operation keeps failing after all retries.
 */
export class NetworkError extends ErrorWithCause<unknown> {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = 'NetworkError';
  }
}

/**
 * Thrown when a git host rejects the credentials used to fetch from it. Never
 * retried.
 */
export class AuthenticationError extends ErrorWithCause<unknown> {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = 'AuthenticationError';
  }
}
