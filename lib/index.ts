export * from './schema';
export * from './config';
export * from './package-source';
export * from './package-orchestrator';
export * from './cache/fingerprint';
export * from './cache/cache-store';
export * from './fetchers/download-client';
export * from './fetchers/git-acquirer';
export * from './fetchers/archive-acquirer';
export * from './fetchers/extract';
export * from './commands/common';
export * from './commands/fetch';
export * from './commands/clear';
export * from './util/flow';
export * from './util/log';
export * from './util/shell';
