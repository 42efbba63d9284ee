import * as crypto from 'crypto';
import { CacheRecord, PackageDescriptor } from '../schema';

export const FINGERPRINT_LENGTH = 16;

export type JsonValue = string | number | boolean | null | JsonValue[] | { readonly [key: string]: JsonValue };

/**
 * JSON with object keys sorted at every level
 */
export function canonicalJson(x: JsonValue): string {
  if (Array.isArray(x)) {
    return `[${x.map(canonicalJson).join(',')}]`;
  }
  if (x !== null && typeof x === 'object') {
    const keys = Object.keys(x).sort();
    return `{${keys.map(k => `${JSON.stringify(k)}:${canonicalJson(x[k])}`).join(',')}}`;
  }
  return JSON.stringify(x);
}

export function standardHash() {
  return crypto.createHash('sha256');
}

/**
 * The identity fields of a descriptor, unset fields as ''
 */
export function toCacheRecord(d: Omit<PackageDescriptor, 'name'>): CacheRecord {
  return {
    version: d.version ?? '',
    gitTag: d.gitTag ?? '',
    githubRepository: d.githubRepository ?? '',
    gitRepository: d.gitRepository ?? '',
    url: d.url ?? '',
  };
}

/**
 * Short stable digest of a package's identity
 *
 * The name is not part of it: records are already stored per name.
 */
export function fingerprint(d: Omit<PackageDescriptor, 'name'> | CacheRecord): string {
  const record = toCacheRecord(d);
  const h = standardHash();
  h.update(canonicalJson({ ...record }));
  return h.digest('hex').substring(0, FINGERPRINT_LENGTH);
}
