import { FetchOutcome } from '../package-orchestrator';
import { deriveName, resolveSource } from '../package-source';
import { FetchError } from '../util/flow';
import { CommonOptions, openWorkspace } from './common';

export interface FetchCommandOptions extends CommonOptions {
  /**
   * Derived from the source when absent
   */
  readonly name?: string;
  readonly version?: string;
  readonly gitTag?: string;
  readonly githubRepository?: string;
  readonly gitRepository?: string;
  readonly url?: string;
  readonly keepUpdated?: boolean;
  readonly options?: readonly string[];
}

export async function fetch(options: FetchCommandOptions): Promise<FetchOutcome> {
  const name = options.name ?? deriveName(options);
  if (!name) {
    throw new FetchError('config', 'Unable to determine package name: pass --name or a source');
  }
  if (!resolveSource(options)) {
    throw new FetchError('config', `No source specified for ${name}`);
  }

  const { orchestrator } = await openWorkspace(options);
  return orchestrator.fetchPackage({
    name,
    version: options.version,
    gitTag: options.gitTag,
    githubRepository: options.githubRepository,
    gitRepository: options.gitRepository,
    url: options.url,
    keepUpdated: options.keepUpdated,
    options: options.options,
  });
}
