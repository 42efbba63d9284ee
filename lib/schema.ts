/**
 * What the caller asks for
 *
 * Only these fields make up a package's identity. Build options are
 * deliberately absent.
 */
export interface PackageDescriptor {
  readonly name: string;
  readonly version?: string;
  /**
   * Tag or branch to clone
   */
  readonly gitTag?: string;
  /**
   * GitHub 'owner/repo', cloned over https
   */
  readonly githubRepository?: string;
  readonly gitRepository?: string;
  /**
   * Archive URL (.zip or a tarball)
   */
  readonly url?: string;
}

/**
 * Contents of '<cacheDir>/<name>/CACHE/.cache'
 *
 * Unset descriptor fields are stored as empty strings.
 */
export interface CacheRecord {
  readonly version: string;
  readonly gitTag: string;
  readonly githubRepository: string;
  readonly gitRepository: string;
  readonly url: string;
}

/**
 * Interesting fields in srccache.json
 */
export interface SrcCacheJson {
  readonly cacheDir?: string;
  readonly retries?: number;
  readonly downloadTimeoutSeconds?: number;
  readonly cloneTimeoutSeconds?: number;
}
