import { promises as fs } from 'fs';
import * as path from 'path';
import { FetchError } from '../util/flow';
import { Logger } from '../util/log';
import { errorMessage } from '../util/runtime';
import { Timer } from '../util/timer';
import { archiveKindOf, extractArchive } from './extract';

/**
 * Something that can put a URL's contents into a file
 */
export interface Downloader {
  fetch(url: string, destPath: string, retries?: number): Promise<void>;
}

export interface ArchiveAcquirerOptions {
  /**
   * Where the downloaded archive is kept while extracting
   */
  readonly downloadDir: string;

  /**
   * @default 3
   */
  readonly retries?: number;
}

/**
 * Download an archive and unpack it as a package directory
 */
export class ArchiveAcquirer {
  constructor(
    private readonly logger: Logger,
    private readonly downloader: Downloader,
    private readonly options: ArchiveAcquirerOptions) {
  }

  public downloadPath(name: string) {
    return path.join(this.options.downloadDir, `${name}_download`);
  }

  /**
   * The downloaded archive is removed again however this ends
   */
  public async fetch(name: string, url: string, destDir: string): Promise<void> {
    this.logger.info(`Starting archive download for package: ${name}`);
    const downloadFile = this.downloadPath(name);

    try {
      await fs.mkdir(this.options.downloadDir, { recursive: true });
      await this.downloader.fetch(url, downloadFile, this.options.retries ?? 3);

      this.logger.info(`Extracting archive for ${name}...`);
      const timer = new Timer(`Extracted ${name}`);
      try {
        await extractArchive(archiveKindOf(url), downloadFile, destDir, this.logger);
      } catch (e) {
        throw new FetchError('archive', `Failed to extract archive for ${name}: ${errorMessage(e)}`, { cause: e });
      }
      this.logger.info(`Extraction completed for ${name}`);
      this.logger.debug(timer.stop().toString());
    } finally {
      await fs.rm(downloadFile, { force: true });
      this.logger.info('Cleaned up temporary download file');
    }
  }
}
