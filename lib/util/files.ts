import { promises as fs, Stats } from 'fs';
import * as path from 'path';
import { errorCode } from './runtime';

export async function exists(s: string, cb?: (s: Stats) => boolean) {
  try {
    const st = await fs.lstat(s);
    return cb === undefined || cb(st);
  } catch (e) {
    if (errorCode(e) === 'ENOENT') { return false; }
    throw e;
  }
}

export function isDirectory(s: string) {
  return exists(s, st => st.isDirectory());
}

export async function rimraf(x: string) {
  await fs.rm(x, { recursive: true, force: true });
}

export async function ensureDirForFile(filePath: string) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
}

export async function readJson<A>(filename: string): Promise<A> {
  try {
    return JSON.parse(await fs.readFile(filename, { encoding: 'utf-8' }));
  } catch (e) {
    throw new Error(`While reading ${filename}: ${e}`, { cause: e });
  }
}

export async function readJsonIfExists<A>(filename: string): Promise<A | undefined> {
  let contents;
  try {
    contents = await fs.readFile(filename, { encoding: 'utf-8' });
  } catch (e) {
    if (errorCode(e) === 'ENOENT') { return undefined; }
    throw new Error(`While reading ${filename}: ${e}`, { cause: e });
  }
  try {
    return JSON.parse(contents);
  } catch (e) {
    throw new Error(`While parsing ${filename}: ${e}`, { cause: e });
  }
}

/**
 * Write JSON to a sibling temp file first, then rename it into place
 */
export async function writeJson<A>(filename: string, obj: A) {
  await ensureDirForFile(filename);
  const tmp = `${filename}.${process.pid}.tmp`;
  await fs.writeFile(tmp, JSON.stringify(obj, undefined, 2), { encoding: 'utf-8' });
  await fs.rename(tmp, filename);
}

/**
 * Find the most specific file with the given name up from the startin directory
 */
export async function findFileUp(filename: string, startDir: string, rootDir?: string): Promise<string | undefined> {
  const ret = await findFilesUp(filename, startDir, rootDir);
  return ret.length > 0 ? ret.pop() : undefined;
}

/**
 * Find all files with the given name up from the starting directory
 *
 * Returns the most specific file at the end.
 */
export async function findFilesUp(filename: string, startDir: string, rootDir?: string): Promise<string[]> {
  const ret = new Array<string>();

  const resolvedRoot = rootDir !== undefined ? path.resolve(rootDir) : undefined;
  let currentDir = path.resolve(startDir);
  while (true) {
    const fullPath = path.join(currentDir, filename);
    if (await exists(fullPath)) {
      ret.push(fullPath);
    }

    if (currentDir === resolvedRoot) { break; }
    const next = path.dirname(currentDir);
    if (next === currentDir) { break; }
    currentDir = next;
  }

  // Most specific file at the end
  return ret.reverse();
}

/**
 * Whether 'fileName' lies strictly below 'directory'
 */
export function isProperChildOf(fileName: string, directory: string) {
  if (!directory.endsWith(path.sep)) { directory += path.sep; }
  return fileName.startsWith(directory);
}
