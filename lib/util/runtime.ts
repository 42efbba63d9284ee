/**
 * The `code` of a Node system error, if any
 */
export function errorCode(e: unknown): string | undefined {
  if (typeof e === 'object' && e !== null && 'code' in e) {
    return typeof e.code === 'string' ? e.code : undefined;
  }
  return undefined;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : `${e}`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(ok => setTimeout(ok, ms));
}

/**
 * Cache the promise, not the value, so that we don't start the computation twice.
 */
export function cachedPromise<K, A>(map: Map<K, Promise<A>>, key: K, fn: () => Promise<A>): Promise<A> {
  let ret = map.get(key);
  if (ret === undefined) {
    ret = fn();
    map.set(key, ret);
  }
  return ret;
}
