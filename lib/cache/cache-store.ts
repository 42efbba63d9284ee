import { promises as fs } from 'fs';
import * as path from 'path';
import { CacheRecord, PackageDescriptor } from '../schema';
import { CacheFile } from '../util/cache-file';
import { KeyedLock } from '../util/concurrency';
import { isDirectory, rimraf } from '../util/files';
import { Logger } from '../util/log';
import { cachedPromise, errorMessage } from '../util/runtime';
import { fingerprint, toCacheRecord } from './fingerprint';

const CACHE_SUBDIR = 'CACHE';
const CACHE_FILE = '.cache';

/**
 * Package records under a cache root
 *
 * Layout:
 *
 * $cacheDir/
 *    <name>/CACHE/.cache    record
 *    <name>/<name>/         package contents
 */
export class CacheStore {
  /**
   * Memoized record reads. A missing record is memoized as 'undefined'.
   */
  private readonly records = new Map<string, Promise<CacheRecord | undefined>>();
  private readonly lock = new KeyedLock();

  constructor(public readonly cacheDir: string, private readonly logger: Logger) {
  }

  public packageRoot(name: string) {
    return path.join(this.cacheDir, name);
  }

  public packageDir(name: string) {
    return path.join(this.cacheDir, name, name);
  }

  public recordFile(name: string) {
    return new CacheFile<CacheRecord>(path.join(this.cacheDir, name, CACHE_SUBDIR, CACHE_FILE));
  }

  /**
   * Whether 'packageDir' holds exactly what 'descriptor' asks for
   *
   * An unreadable record makes the cache invalid rather than failing.
   */
  public async isValid(name: string, descriptor: PackageDescriptor, packageDir = this.packageDir(name)): Promise<boolean> {
    if (!await isDirectory(packageDir)) { return false; }

    let record;
    try {
      record = await this.load(name);
    } catch (e) {
      this.logger.warning(`Ignoring unreadable cache record for ${name}: ${errorMessage(e)}`);
      return false;
    }
    if (!record) { return false; }

    return fingerprint(record) === fingerprint(descriptor);
  }

  public load(name: string): Promise<CacheRecord | undefined> {
    return this.lock.run(name, async () => {
      try {
        return await cachedPromise(this.records, name, () => this.readRecord(name));
      } catch (e) {
        // Don't memoize failures, the next call should look at the disk again
        this.records.delete(name);
        throw e;
      }
    });
  }

  public save(name: string, descriptor: PackageDescriptor): Promise<void> {
    const record = toCacheRecord(descriptor);
    return this.lock.run(name, async () => {
      await this.recordFile(name).write(record);
      this.records.set(name, Promise.resolve(record));
    });
  }

  /**
   * Remove the package directory and its record together
   *
   * Returns whether there was anything to remove.
   */
  public invalidate(name: string): Promise<boolean> {
    return this.lock.run(name, async () => {
      this.records.delete(name);
      const root = this.packageRoot(name);
      const existed = await isDirectory(root);
      await rimraf(root);
      return existed;
    });
  }

  /**
   * Empty the whole cache root
   */
  public async clearAll(): Promise<void> {
    this.records.clear();
    await rimraf(this.cacheDir);
    await fs.mkdir(this.cacheDir, { recursive: true });
  }

  private async readRecord(name: string): Promise<CacheRecord | undefined> {
    const raw = await this.recordFile(name).read();
    if (raw === undefined) { return undefined; }
    return parseCacheRecord(raw);
  }
}

/**
 * Validate a record read from disk
 */
export function parseCacheRecord(raw: unknown): CacheRecord {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Expected an object, got: ${JSON.stringify(raw)}`);
  }
  const fields = ['version', 'gitTag', 'githubRepository', 'gitRepository', 'url'] as const;
  const values = new Map<string, unknown>(Object.entries(raw));
  for (const field of fields) {
    const v = values.get(field);
    if (v !== undefined && typeof v !== 'string') {
      throw new Error(`Field '${field}' should be a string, got: ${JSON.stringify(v)}`);
    }
  }
  const str = (field: typeof fields[number]) => {
    const v = values.get(field);
    return typeof v === 'string' ? v : '';
  };
  return {
    version: str('version'),
    gitTag: str('gitTag'),
    githubRepository: str('githubRepository'),
    gitRepository: str('gitRepository'),
    url: str('url'),
  };
}
