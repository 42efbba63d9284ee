import { CacheStore } from './cache/cache-store';
import { hasGitSource, parseBuildOptions, PackageSource, resolveSource } from './package-source';
import { PackageDescriptor } from './schema';
import { isDirectory } from './util/files';
import { FetchError } from './util/flow';
import { Logger } from './util/log';
import { errorMessage } from './util/runtime';
import { Timer } from './util/timer';

export interface GitBackend {
  clone(name: string, repoUrl: string, dest: string, tag?: string): Promise<void>;
  update(dest: string): Promise<boolean>;
}

export interface ArchiveBackend {
  fetch(name: string, url: string, destDir: string): Promise<void>;
}

export interface FetchRequest extends PackageDescriptor {
  /**
   * Pull the latest changes into an existing git checkout
   */
  readonly keepUpdated?: boolean;

  /**
   * Build options ('NAME VALUE'), never part of the package identity
   */
  readonly options?: readonly string[];
}

export type FetchAction = 'cached' | 'updated' | 'fetched';

export interface FetchOutcome {
  readonly action: FetchAction;
  /**
   * Whether an existing copy was thrown away first
   */
  readonly refetched: boolean;
  readonly packageDir: string;
}

export interface PackageOrchestratorProps {
  readonly cache: CacheStore;
  readonly git: GitBackend;
  readonly archive: ArchiveBackend;
  readonly logger: Logger;
}

/**
 * Decides between reusing, updating and (re)fetching a package
 */
export class PackageOrchestrator {
  private readonly cache: CacheStore;
  private readonly git: GitBackend;
  private readonly archive: ArchiveBackend;
  private readonly logger: Logger;

  constructor(props: PackageOrchestratorProps) {
    this.cache = props.cache;
    this.git = props.git;
    this.archive = props.archive;
    this.logger = props.logger;
  }

  public async fetchPackage(request: FetchRequest): Promise<FetchOutcome> {
    const name = validateName(request.name);
    const source = resolveSource(request);
    if (!source) {
      throw new FetchError('config', `No source specified for ${name}`);
    }

    const descriptor = identityOf(request);
    const packageDir = this.cache.packageDir(name);
    const log = this.logger;

    log.info(`Processing package: ${name}`);
    if (request.version) { log.info(`Version: ${request.version}`); }
    if (request.gitTag) { log.info(`Git tag: ${request.gitTag}`); }
    for (const opt of parseBuildOptions(request.options ?? [])) {
      log.debug(`Build option ${opt.name}=${opt.value}`);
    }

    log.info('Checking cache validity...');
    let refetched = false;
    if (await isDirectory(packageDir) && !await this.cache.isValid(name, descriptor, packageDir)) {
      log.status('REFETCH', name);
      await this.clear(name);
      refetched = true;
    }

    if (await isDirectory(packageDir)) {
      if (request.keepUpdated && hasGitSource(request)) {
        log.status('UPDATE', name);
        log.info('Attempting to update existing package...');
        if (await this.git.update(packageDir)) {
          log.status('EXISTS', packageDir);
          return { action: 'updated', refetched, packageDir };
        }
        log.info('Update failed, clearing cache for refetch...');
        await this.clear(name);
        refetched = true;
      } else {
        log.status('CACHED', name);
        log.info('Using cached package');
        log.status('EXISTS', packageDir);
        return { action: 'cached', refetched, packageDir };
      }
    } else {
      // A record without a package directory is leftover state
      await this.cache.invalidate(name);
    }

    log.info('Package not in cache, downloading...');
    const timer = new Timer(`Fetched ${name}`);
    try {
      await this.acquire(name, source, packageDir);
    } catch (e) {
      await this.cache.invalidate(name);
      const kind = FetchError.isFetchError(e) ? e.kind : source.kind === 'git' ? 'vcs' : 'archive';
      throw new FetchError(kind, `Failed to fetch ${name}: ${errorMessage(e)}`, { cause: e });
    }
    log.debug(timer.stop().toString());

    log.info('Saving package metadata...');
    await this.cache.save(name, descriptor);
    log.success(packageDir);
    log.status('EXISTS', packageDir);
    return { action: 'fetched', refetched, packageDir };
  }

  /**
   * Remove one package and its record
   */
  public async clearPackage(name: string): Promise<void> {
    validateName(name);
    this.logger.info(`Clearing package cache for: ${name}`);
    if (await this.cache.invalidate(name)) {
      this.logger.info(`Package ${name} cleared successfully`);
    } else {
      this.logger.info(`Package ${name} not found in cache`);
    }
  }

  /**
   * Remove every package under the cache root
   */
  public async clearAll(): Promise<void> {
    this.logger.info(`Clearing cache directory: ${this.cache.cacheDir}`);
    await this.cache.clearAll();
  }

  private async clear(name: string) {
    this.logger.info(`Clearing package cache for: ${name}`);
    await this.cache.invalidate(name);
  }

  private async acquire(name: string, source: PackageSource, packageDir: string) {
    switch (source.kind) {
      case 'git':
        this.logger.info(`Using git repository: ${source.repository}`);
        this.logger.info(`Starting clone for package: ${name}`);
        return this.git.clone(name, source.repository, packageDir, source.tag);
      case 'archive':
        this.logger.info(`Using URL: ${source.url}`);
        return this.archive.fetch(name, source.url, packageDir);
    }
  }
}

/**
 * Only the fields that make up the package identity
 */
export function identityOf(d: PackageDescriptor): PackageDescriptor {
  return {
    name: d.name,
    version: d.version,
    gitTag: d.gitTag,
    githubRepository: d.githubRepository,
    gitRepository: d.gitRepository,
    url: d.url,
  };
}

/**
 * A name becomes a directory under the cache root, twice
 */
function validateName(name: string): string {
  if (!name || name === '.' || name === '..' || /[/\\]/.test(name)) {
    throw new FetchError('config', `Invalid package name: '${name}'`);
  }
  return name;
}
