import { promises as fs } from 'fs';
import * as path from 'path';
import { CacheStore } from '../cache/cache-store';
import { loadConfig, SrcCacheConfig } from '../config';
import { ArchiveAcquirer } from '../fetchers/archive-acquirer';
import { DownloadClient } from '../fetchers/download-client';
import { GitAcquirer } from '../fetchers/git-acquirer';
import { PackageOrchestrator } from '../package-orchestrator';
import { FetchError } from '../util/flow';
import { Logger } from '../util/log';

export interface CommonOptions {
  /**
   * Overrides the cache directory from srccache.json
   */
  readonly cacheDir?: string;
  /**
   * Where to start looking for srccache.json
   *
   * @default process.cwd()
   */
  readonly cwd?: string;
  readonly logger: Logger;
}

export interface Workspace {
  readonly cacheDir: string;
  readonly config: SrcCacheConfig;
  readonly orchestrator: PackageOrchestrator;
}

/**
 * Wire up the orchestrator for a cache root
 */
export async function openWorkspace(options: CommonOptions): Promise<Workspace> {
  const cwd = options.cwd ?? process.cwd();
  const config = await loadConfig(cwd);
  const configured = options.cacheDir !== undefined ? path.resolve(cwd, options.cacheDir) : config.cacheDir;
  if (configured === undefined) {
    throw new FetchError('config', `No cache directory given and no 'cacheDir' in srccache.json upwards of '${cwd}'`);
  }
  if (config.configFile) {
    options.logger.debug(`Using configuration from ${config.configFile}`);
  }

  const cacheDir = configured;
  await fs.mkdir(cacheDir, { recursive: true });

  const logger = options.logger;
  const cache = new CacheStore(cacheDir, logger);
  const git = new GitAcquirer(logger, { timeouts: { cloneMs: config.cloneTimeoutMs } });
  const downloader = new DownloadClient(logger, { timeoutMs: config.downloadTimeoutMs });
  const archive = new ArchiveAcquirer(logger, downloader, { downloadDir: cacheDir, retries: config.retries });

  return {
    cacheDir,
    config,
    orchestrator: new PackageOrchestrator({ cache, git, archive, logger }),
  };
}
