import { xz } from '@napi-rs/lzma';
import { createReadStream, createWriteStream, promises as fs } from 'fs';
import * as path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import * as tar from 'tar';
import unbzip2 = require('unbzip2-stream');
import * as yauzl from 'yauzl';
import { isProperChildOf } from '../util/files';
import { Logger } from '../util/log';

const PROGRESS_EVERY = 100;

export type ArchiveKind = 'zip' | 'tar';

/**
 * Outer compression of a tarball. node-tar reads 'none' and 'gzip' itself.
 */
export type TarCompression = 'none' | 'gzip' | 'bzip2' | 'xz';

const GZIP_MAGIC = Buffer.from([0x1f, 0x8b]);
const BZIP2_MAGIC = Buffer.from('BZh', 'latin1');
const XZ_MAGIC = Buffer.from([0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00]);

export interface ArchiveEntryName {
  readonly path: string;
  readonly isDirectory: boolean;
}

/**
 * Determine the archive format from the URL's path
 *
 * Anything that isn't a .zip is treated as a (possibly gzipped) tarball.
 */
export function archiveKindOf(url: string): ArchiveKind {
  let pathname = url;
  try {
    pathname = new URL(url).pathname;
  } catch {
    // Not a URL, use as a plain path
  }
  return pathname.toLowerCase().endsWith('.zip') ? 'zip' : 'tar';
}

/**
 * Path components of an archive entry, without '.' and trailing empty components
 */
export function entryComponents(entryPath: string): string[] {
  const parts = rawComponents(entryPath).filter(p => p !== '.');
  while (parts.length > 0 && parts[parts.length - 1] === '') {
    parts.pop();
  }
  return parts;
}

function rawComponents(entryPath: string): string[] {
  return entryPath.replace(/\\/g, '/').split('/');
}

/**
 * Leading directory components shared by every entry
 *
 * A file only contributes the directories it lives in, so an archive
 * holding a single file has no common prefix. The archive root itself
 * ('./') contributes nothing.
 */
export function commonDirectoryPrefix(entries: ArchiveEntryName[]): string[] {
  let prefix: string[] | undefined;
  for (const entry of entries) {
    const parts = entryComponents(entry.path);
    if (parts.length === 0) { continue; }
    const dirs = entry.isDirectory ? parts : parts.slice(0, -1);

    if (prefix === undefined) {
      prefix = dirs;
      continue;
    }
    let i = 0;
    while (i < prefix.length && i < dirs.length && prefix[i] === dirs[i]) { i++; }
    prefix = prefix.slice(0, i);
    if (prefix.length === 0) { break; }
  }
  return prefix ?? [];
}

/**
 * Number of leading '.' components all entries start with, as in 'tar -C dir .'
 */
export function sharedLeadingDots(entries: ArchiveEntryName[]): number {
  let shared: number | undefined;
  for (const entry of entries) {
    if (entryComponents(entry.path).length === 0) { continue; }
    const raw = rawComponents(entry.path);
    let n = 0;
    while (raw[n] === '.') { n++; }
    shared = shared === undefined ? n : Math.min(shared, n);
  }
  return shared ?? 0;
}

/**
 * Sniff the compression of a tarball from its first bytes
 */
export async function detectTarCompression(file: string): Promise<TarCompression> {
  const handle = await fs.open(file, 'r');
  try {
    const header = Buffer.alloc(XZ_MAGIC.length);
    const { bytesRead } = await handle.read(header, 0, header.length, 0);
    const head = header.subarray(0, bytesRead);
    if (startsWith(head, GZIP_MAGIC)) { return 'gzip'; }
    if (startsWith(head, BZIP2_MAGIC)) { return 'bzip2'; }
    if (startsWith(head, XZ_MAGIC)) { return 'xz'; }
    return 'none';
  } finally {
    await handle.close();
  }
}

function startsWith(buf: Buffer, magic: Buffer) {
  return buf.length >= magic.length && buf.subarray(0, magic.length).equals(magic);
}

/**
 * Extract an archive into 'destDir', dropping a shared top-level directory
 */
export async function extractArchive(kind: ArchiveKind, file: string, destDir: string, logger: Logger): Promise<void> {
  await fs.mkdir(destDir, { recursive: true });
  switch (kind) {
    case 'zip':
      logger.info('Detected ZIP archive');
      return extractZip(file, destDir, logger);
    case 'tar':
      logger.info('Detected TAR archive');
      return extractTar(file, destDir, logger);
  }
}

async function extractTar(file: string, destDir: string, logger: Logger) {
  const compression = await detectTarCompression(file);
  logger.debug(`Tarball compression: ${compression}`);

  if (compression === 'bzip2' || compression === 'xz') {
    const plain = `${file}.tar`;
    try {
      await decompress(compression, file, plain);
      await extractPlainTar(plain, destDir, logger);
    } finally {
      await fs.rm(plain, { force: true });
    }
    return;
  }
  await extractPlainTar(file, destDir, logger);
}

/**
 * Undo the outer compression node-tar cannot read itself
 */
async function decompress(compression: 'bzip2' | 'xz', file: string, out: string) {
  switch (compression) {
    case 'bzip2':
      await pipeline(createReadStream(file), unbzip2(), createWriteStream(out));
      return;
    case 'xz':
      await fs.writeFile(out, await xz.decompress(await fs.readFile(file)));
      return;
  }
}

async function extractPlainTar(file: string, destDir: string, logger: Logger) {
  const entries = new Array<ArchiveEntryName>();
  await tar.t({
    file,
    strict: true,
    onentry: (entry) => {
      entries.push({ path: entry.path, isDirectory: entry.type === 'Directory' });
    },
  });
  logger.info(`Archive contains ${entries.length} files`);

  const prefix = commonDirectoryPrefix(entries);
  if (prefix.length > 0) {
    logger.info(`Stripping common prefix: ${prefix.join('/')}`);
  }

  let extracted = 0;
  await tar.x({
    file,
    cwd: destDir,
    strict: true,
    // node-tar counts the './' components too
    strip: prefix.length > 0 ? sharedLeadingDots(entries) + prefix.length : 0,
    filter: () => {
      extracted += 1;
      if (extracted % PROGRESS_EVERY === 0) {
        logger.info(`Extracted ${extracted}/${entries.length} files...`);
      }
      return true;
    },
  });
}

async function extractZip(file: string, destDir: string, logger: Logger) {
  const zip = await openZip(file);
  try {
    const entries = await readAllEntries(zip);
    logger.info(`Archive contains ${entries.length} files`);

    const prefix = commonDirectoryPrefix(entries.map(e => ({ path: e.fileName, isDirectory: e.fileName.endsWith('/') })));
    if (prefix.length > 0) {
      logger.info(`Stripping common prefix: ${prefix.join('/')}`);
    }

    const root = path.resolve(destDir);
    for (const [idx, entry] of entries.entries()) {
      if (idx % PROGRESS_EVERY === 0 && idx > 0) {
        logger.info(`Extracted ${idx}/${entries.length} files...`);
      }

      const parts = entryComponents(entry.fileName).slice(prefix.length);
      if (parts.length === 0) { continue; }

      const target = path.resolve(root, ...parts);
      if (!isProperChildOf(target, root)) {
        throw new Error(`Refusing to extract '${entry.fileName}' outside of ${destDir}`);
      }

      if (entry.fileName.endsWith('/')) {
        await fs.mkdir(target, { recursive: true });
      } else {
        await fs.mkdir(path.dirname(target), { recursive: true });
        await pipeline(await openReadStream(zip, entry), createWriteStream(target));
      }
    }
  } finally {
    zip.close();
  }
}

function openZip(file: string): Promise<yauzl.ZipFile> {
  return new Promise((ok, ko) => {
    yauzl.open(file, { lazyEntries: true, autoClose: false }, (err, zip) => {
      if (err) { ko(err); return; }
      if (!zip) { ko(new Error(`Could not open ${file}`)); return; }
      ok(zip);
    });
  });
}

function readAllEntries(zip: yauzl.ZipFile): Promise<yauzl.Entry[]> {
  return new Promise((ok, ko) => {
    const entries = new Array<yauzl.Entry>();
    zip.on('entry', (entry: yauzl.Entry) => {
      entries.push(entry);
      zip.readEntry();
    });
    zip.on('end', () => ok(entries));
    zip.on('error', ko);
    zip.readEntry();
  });
}

function openReadStream(zip: yauzl.ZipFile, entry: yauzl.Entry): Promise<Readable> {
  return new Promise((ok, ko) => {
    zip.openReadStream(entry, (err, stream) => {
      if (err) { ko(err); return; }
      if (!stream) { ko(new Error(`Could not read ${entry.fileName}`)); return; }
      ok(stream);
    });
  });
}
