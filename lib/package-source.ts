import { PackageDescriptor } from './schema';

/**
 * Where a package's contents come from
 */
export type PackageSource =
  | { readonly kind: 'git'; readonly repository: string; readonly tag?: string }
  | { readonly kind: 'archive'; readonly url: string };

const ARCHIVE_EXTENSIONS = ['.tar.gz', '.tar.bz2', '.tar.xz', '.tgz', '.zip'];

export function githubCloneUrl(ownerRepo: string) {
  return `https://github.com/${ownerRepo}.git`;
}

/**
 * Pick the acquisition source: GitHub, then git, then archive URL
 *
 * A git source without an explicit tag is cloned at 'v<version>' when a
 * version is given.
 */
export function resolveSource(d: Omit<PackageDescriptor, 'name'>): PackageSource | undefined {
  const repository = d.githubRepository ? githubCloneUrl(d.githubRepository) : d.gitRepository;
  if (repository) {
    const tag = d.gitTag || (d.version ? `v${d.version}` : undefined);
    return { kind: 'git', repository, tag };
  }
  if (d.url) {
    return { kind: 'archive', url: d.url };
  }
  return undefined;
}

export function hasGitSource(d: Omit<PackageDescriptor, 'name'>) {
  return !!(d.githubRepository || d.gitRepository);
}

/**
 * Guess a package name from its source
 *
 * - 'owner/repo' -> 'repo'
 * - 'https://host/path/repo.git' -> 'repo'
 * - 'https://host/dl/foo-1.2.tar.gz' -> 'foo-1.2'
 */
export function deriveName(d: Omit<PackageDescriptor, 'name'>): string | undefined {
  if (d.githubRepository) {
    return lastSegment(d.githubRepository);
  }
  if (d.gitRepository) {
    return lastSegment(d.gitRepository)?.replace(/\.git$/, '');
  }
  if (d.url) {
    const base = lastSegment(urlPath(d.url));
    if (base === undefined) { return undefined; }
    const ext = ARCHIVE_EXTENSIONS.find(e => base.toLowerCase().endsWith(e));
    return ext ? base.substring(0, base.length - ext.length) : base;
  }
  return undefined;
}

function urlPath(url: string) {
  try {
    return new URL(url).pathname;
  } catch {
    return url;
  }
}

function lastSegment(s: string): string | undefined {
  const parts = s.split(/[/:]/).filter(p => p !== '');
  return parts.length > 0 ? parts[parts.length - 1] : undefined;
}

export interface BuildOption {
  readonly name: string;
  readonly value: string;
}

/**
 * Parse 'NAME VALUE' build options
 *
 * These are handed to the build and never take part in a package's identity.
 */
export function parseBuildOptions(options: readonly string[]): BuildOption[] {
  return options.map(opt => {
    const trimmed = opt.trim();
    const space = trimmed.search(/\s/);
    return space < 0
      ? { name: trimmed, value: '' }
      : { name: trimmed.substring(0, space), value: trimmed.substring(space).trim() };
  });
}
