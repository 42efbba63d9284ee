import { promises as fs } from 'fs';
import * as path from 'path';
import { DEFAULT_CONFIG, loadConfig } from '../lib/config';
import { FetchError } from '../lib/util/flow';
import { makeTmpDir, writeFiles } from './helpers';

let dir: string;

beforeEach(async () => {
  dir = await makeTmpDir();
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

test('defaults without a configuration file', async () => {
  expect(await loadConfig(dir)).toEqual(DEFAULT_CONFIG);
});

test('settings are found upwards and cacheDir is relative to the file', async () => {
  await writeFiles(dir, {
    'srccache.json': JSON.stringify({ cacheDir: '.deps', retries: 5, cloneTimeoutSeconds: 60 }),
  });

  const config = await loadConfig(path.join(dir, 'project', 'build'));

  expect(config).toEqual({
    cacheDir: path.join(dir, '.deps'),
    retries: 5,
    downloadTimeoutMs: 30_000,
    cloneTimeoutMs: 60_000,
    configFile: path.join(dir, 'srccache.json'),
  });
});

test('nearest configuration file wins', async () => {
  await writeFiles(dir, {
    'srccache.json': JSON.stringify({ retries: 5 }),
    'project/srccache.json': JSON.stringify({ retries: 2 }),
  });

  const config = await loadConfig(path.join(dir, 'project'));

  expect(config.retries).toEqual(2);
  expect(config.cacheDir).toBeUndefined();
});

test('invalid setting is a configuration error', async () => {
  await writeFiles(dir, { 'srccache.json': JSON.stringify({ retries: 0 }) });

  const error = await loadConfig(dir).catch((e: unknown) => e);

  expect(error).toBeInstanceOf(FetchError);
  expect(error).toMatchObject({
    kind: 'config',
    message: `${path.join(dir, 'srccache.json')}: 'retries' should be a number >= 1`,
  });
});

test('malformed JSON is a configuration error', async () => {
  await writeFiles(dir, { 'srccache.json': '{ "retries": ' });

  await expect(loadConfig(dir)).rejects.toMatchObject({ kind: 'config' });
});
