import { readJsonIfExists, writeJson } from './files';

/**
 * A small JSON document on disk
 */
export class CacheFile<A extends object> {
  constructor(public readonly fileName: string) {
  }

  public read(): Promise<A | undefined> {
    return readJsonIfExists<A>(this.fileName);
  }

  public write(content: A) {
    return writeJson(this.fileName, content);
  }
}
