import { promises as fs } from 'fs';
import * as path from 'path';
import { ArchiveAcquirer } from '../lib/fetchers/archive-acquirer';
import { FetchError } from '../lib/util/flow';
import { MemoryLogger } from '../lib/util/log';
import { FakeDownloader, makeTarGz, makeTmpDir, makeZip, pathExists } from './helpers';

let dir: string;
let cacheDir: string;
let logger: MemoryLogger;

beforeEach(async () => {
  dir = await makeTmpDir();
  cacheDir = path.join(dir, 'cache');
  logger = new MemoryLogger();
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

test('download path sits next to the packages', () => {
  const acquirer = new ArchiveAcquirer(logger, new FakeDownloader('unused'), { downloadDir: cacheDir });
  expect(acquirer.downloadPath('foo')).toEqual(path.join(cacheDir, 'foo_download'));
});

test('tarball is downloaded, unpacked and removed', async () => {
  const archive = path.join(dir, 'foo-1.0.tar.gz');
  await makeTarGz(archive, {
    'foo-1.0/CMakeLists.txt': 'project(foo)\n',
    'foo-1.0/include/foo.h': '#pragma once\n',
  });
  const downloader = new FakeDownloader(archive);
  const acquirer = new ArchiveAcquirer(logger, downloader, { downloadDir: cacheDir, retries: 5 });
  const dest = path.join(cacheDir, 'foo', 'foo');

  await acquirer.fetch('foo', 'https://example.test/foo-1.0.tar.gz', dest);

  expect(downloader.calls).toEqual([{
    url: 'https://example.test/foo-1.0.tar.gz',
    destPath: path.join(cacheDir, 'foo_download'),
    retries: 5,
  }]);
  expect(await fs.readFile(path.join(dest, 'include', 'foo.h'), 'utf-8')).toEqual('#pragma once\n');
  expect(await pathExists(path.join(dest, 'foo-1.0'))).toBe(false);
  expect(await pathExists(path.join(cacheDir, 'foo_download'))).toBe(false);
  expect(logger.messages('info')).toContain('Cleaned up temporary download file');
});

test('zip is recognized from the URL', async () => {
  const archive = path.join(dir, 'foo.zip');
  await makeZip(archive, { 'foo-1.0/CMakeLists.txt': 'project(foo)\n' });
  const downloader = new FakeDownloader(archive);
  const acquirer = new ArchiveAcquirer(logger, downloader, { downloadDir: cacheDir });
  const dest = path.join(cacheDir, 'foo', 'foo');

  await acquirer.fetch('foo', 'https://example.test/foo-1.0.zip', dest);

  expect(downloader.calls[0].retries).toEqual(3);
  expect(await fs.readdir(dest)).toEqual(['CMakeLists.txt']);
  expect(logger.messages('info')).toContain('Detected ZIP archive');
});

test('corrupt archive is an archive error and the download is removed', async () => {
  const archive = path.join(dir, 'broken.zip');
  await fs.writeFile(archive, 'this is not a zip file');
  const acquirer = new ArchiveAcquirer(logger, new FakeDownloader(archive), { downloadDir: cacheDir });

  const error = await acquirer.fetch('foo', 'https://example.test/foo.zip', path.join(cacheDir, 'foo', 'foo'))
    .catch((e: unknown) => e);

  expect(error).toBeInstanceOf(FetchError);
  expect(error).toMatchObject({ kind: 'archive' });
  expect(String(error)).toContain('Failed to extract archive for foo: ');
  expect(await pathExists(path.join(cacheDir, 'foo_download'))).toBe(false);
});

test('download failure passes through and the partial file is removed', async () => {
  const failure = new FetchError('network', 'Failed to download https://example.test/foo.tgz after 3 attempts: HTTP 503 Service Unavailable');
  const acquirer = new ArchiveAcquirer(logger, new FakeDownloader(failure), { downloadDir: cacheDir });

  await expect(acquirer.fetch('foo', 'https://example.test/foo.tgz', path.join(cacheDir, 'foo', 'foo')))
    .rejects.toBe(failure);
  expect(await pathExists(path.join(cacheDir, 'foo_download'))).toBe(false);
});
