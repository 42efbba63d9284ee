/**
 * An error whose message is meant for the user, printed without a stack trace
 */
export class SimpleError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Failure categories of a package fetch
 *
 * - network: a download exhausted its retries
 * - vcs: a clone failed
 * - archive: the downloaded archive could not be extracted
 * - config: the request itself is unusable (no source, no name)
 * - cache: a persisted record could not be read
 */
export type FetchErrorKind = 'network' | 'vcs' | 'archive' | 'config' | 'cache';

export class FetchError extends SimpleError {
  public static isFetchError(x: unknown): x is FetchError {
    return x instanceof FetchError;
  }

  constructor(public readonly kind: FetchErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}
