import { createWriteStream } from 'fs';
import * as http from 'http';
import * as https from 'https';
import { pipeline } from 'stream/promises';
import { ensureDirForFile } from '../util/files';
import { FetchError } from '../util/flow';
import { Logger } from '../util/log';
import { errorMessage, sleep } from '../util/runtime';
import { Timer } from '../util/timer';

const CHUNK_SIZE = 128 * 1024;

export interface DownloadClientOptions {
  /**
   * Socket inactivity timeout
   *
   * @default 30000
   */
  readonly timeoutMs?: number;

  /**
   * Wait before retry N (counting from 0) is `2^N * backoffBaseMs`
   *
   * @default 1000
   */
  readonly backoffBaseMs?: number;

  /**
   * @default 5
   */
  readonly maxRedirects?: number;
}

/**
 * Download a single artifact to a file, retrying with exponential backoff
 */
export class DownloadClient {
  private readonly timeoutMs: number;
  private readonly backoffBaseMs: number;
  private readonly maxRedirects: number;

  constructor(private readonly logger: Logger, options: DownloadClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.backoffBaseMs = options.backoffBaseMs ?? 1000;
    this.maxRedirects = options.maxRedirects ?? 5;
  }

  public async fetch(url: string, destPath: string, retries = 3): Promise<void> {
    const attempts = Math.max(1, retries);
    let lastError: unknown;

    for (let attempt = 0; attempt < attempts; attempt++) {
      try {
        this.logger.info(`Downloading from: ${url}`);
        const timer = new Timer(`Downloaded ${url}`);
        await this.attempt(url, destPath);
        this.logger.info('Download completed successfully');
        this.logger.debug(timer.stop().toString());
        return;
      } catch (e) {
        lastError = e;
        this.logger.warning(`Download attempt ${attempt + 1} failed: ${errorMessage(e)}`);
        if (attempt < attempts - 1) {
          const waitMs = 2 ** attempt * this.backoffBaseMs;
          this.logger.info(`Retrying in ${waitMs / 1000} seconds...`);
          await sleep(waitMs);
        }
      }
    }

    throw new FetchError('network', `Failed to download ${url} after ${attempts} attempts: ${errorMessage(lastError)}`, { cause: lastError });
  }

  private async attempt(url: string, destPath: string) {
    const response = await this.open(url, this.maxRedirects);

    const totalSize = parseInt(response.headers['content-length'] ?? '', 10);
    const haveSize = Number.isFinite(totalSize) && totalSize > 0;
    if (haveSize) {
      this.logger.info(`File size: ${(totalSize / (1024 * 1024)).toFixed(2)} MB`);
    }

    const logger = this.logger;
    let downloaded = 0;
    let lastStep = 0;

    await ensureDirForFile(destPath);
    // flags 'w' truncates whatever a previous attempt left behind
    await pipeline(
      response,
      async function* (source: AsyncIterable<Buffer>) {
        for await (const chunk of source) {
          downloaded += chunk.length;
          if (haveSize) {
            const step = Math.floor(Math.min(100, (downloaded / totalSize) * 100) / 10) * 10;
            if (step > lastStep) {
              logger.info(`Download progress: ${step}%`);
              lastStep = step;
            }
          }
          yield chunk;
        }
      },
      createWriteStream(destPath, { flags: 'w', highWaterMark: CHUNK_SIZE }),
    );
  }

  /**
   * GET the URL, following redirects, and resolve with a 2xx response
   */
  private open(url: string, redirectsLeft: number): Promise<http.IncomingMessage> {
    const parsed = new URL(url);
    if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
      return Promise.reject(new Error(`Unsupported protocol: ${parsed.protocol}`));
    }

    return new Promise((ok, ko) => {
      const onResponse = (response: http.IncomingMessage) => {
        const status = response.statusCode ?? 0;
        const location = response.headers.location;

        if (status >= 300 && status < 400 && location) {
          response.resume();
          if (redirectsLeft <= 0) {
            ko(new Error(`Too many redirects at ${url}`));
            return;
          }
          ok(this.open(new URL(location, parsed).toString(), redirectsLeft - 1));
          return;
        }

        if (status < 200 || status >= 300) {
          response.resume();
          ko(new Error(`HTTP ${status}${response.statusMessage ? ` ${response.statusMessage}` : ''}`));
          return;
        }

        ok(response);
      };

      const options: http.RequestOptions = {
        headers: { 'User-Agent': 'srccache/1.0' },
        timeout: this.timeoutMs,
      };
      const request = parsed.protocol === 'https:'
        ? https.get(parsed, options, onResponse)
        : http.get(parsed, options, onResponse);

      request.on('timeout', () => {
        request.destroy(new Error(`Timed out after ${this.timeoutMs}ms`));
      });
      request.on('error', ko);
    });
  }
}
