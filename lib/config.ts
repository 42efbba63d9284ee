import * as path from 'path';
import { SrcCacheJson } from './schema';
import { findFileUp, readJson } from './util/files';
import { FetchError } from './util/flow';
import { errorMessage } from './util/runtime';

export const CONFIG_FILE_NAME = 'srccache.json';

export interface SrcCacheConfig {
  /**
   * Absolute cache root, if configured
   */
  readonly cacheDir?: string;
  readonly retries: number;
  readonly downloadTimeoutMs: number;
  readonly cloneTimeoutMs: number;
  /**
   * The file these settings were read from
   */
  readonly configFile?: string;
}

export const DEFAULT_CONFIG: SrcCacheConfig = {
  retries: 3,
  downloadTimeoutMs: 30_000,
  cloneTimeoutMs: 600_000,
};

/**
 * Settings from the nearest srccache.json upwards of 'dir', over the defaults
 */
export async function loadConfig(dir: string): Promise<SrcCacheConfig> {
  const configFile = await findFileUp(CONFIG_FILE_NAME, dir);
  if (configFile === undefined) {
    return DEFAULT_CONFIG;
  }

  let raw: unknown;
  try {
    raw = await readJson<unknown>(configFile);
  } catch (e) {
    throw new FetchError('config', errorMessage(e), { cause: e });
  }
  const json = validateConfigJson(raw, configFile);

  return {
    cacheDir: json.cacheDir !== undefined ? path.resolve(path.dirname(configFile), json.cacheDir) : undefined,
    retries: json.retries ?? DEFAULT_CONFIG.retries,
    downloadTimeoutMs: json.downloadTimeoutSeconds !== undefined ? json.downloadTimeoutSeconds * 1000 : DEFAULT_CONFIG.downloadTimeoutMs,
    cloneTimeoutMs: json.cloneTimeoutSeconds !== undefined ? json.cloneTimeoutSeconds * 1000 : DEFAULT_CONFIG.cloneTimeoutMs,
    configFile,
  };
}

export function validateConfigJson(raw: unknown, fileName: string): SrcCacheJson {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new FetchError('config', `${fileName}: expected an object`);
  }
  const fields = new Map<string, unknown>(Object.entries(raw));

  let cacheDir: string | undefined;
  const rawDir = fields.get('cacheDir');
  if (rawDir !== undefined) {
    if (typeof rawDir !== 'string' || rawDir === '') {
      throw new FetchError('config', `${fileName}: 'cacheDir' should be a non-empty string`);
    }
    cacheDir = rawDir;
  }

  const number = (key: keyof SrcCacheJson, min: number): number | undefined => {
    const v = fields.get(key);
    if (v === undefined) { return undefined; }
    if (typeof v !== 'number' || !Number.isFinite(v) || v < min) {
      throw new FetchError('config', `${fileName}: '${key}' should be a number >= ${min}`);
    }
    return v;
  };

  return {
    cacheDir,
    retries: number('retries', 1),
    downloadTimeoutSeconds: number('downloadTimeoutSeconds', 1),
    cloneTimeoutSeconds: number('cloneTimeoutSeconds', 1),
  };
}
