#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { clear } from '../lib/commands/clear';
import { fetch } from '../lib/commands/fetch';
import { SimpleError } from '../lib/util/flow';
import { ConsoleLogger } from '../lib/util/log';

const logger = new ConsoleLogger();

async function main() {
  const argv = yargs(hideBin(process.argv))
    .usage('$0 <cmd> [args]')
    // '--version' is the package's version, not this tool's
    .version(false)
    .command('fetch', 'Materialize a package in the cache, reusing a valid copy')
    .command('clear', 'Remove the whole cache, or one package with --package')
    .demandCommand(1, 'Specify a command')
    .option('cache-dir', {
      type: 'string',
      desc: 'Cache root (default: cacheDir from srccache.json)',
      requiresArg: true,
    })
    .option('name', {
      type: 'string',
      desc: 'Package name (default: derived from the source)',
      requiresArg: true,
    })
    .option('version', {
      type: 'string',
      desc: 'Package version, cloned as tag v<version> when no --git-tag is given',
      requiresArg: true,
    })
    .option('git-tag', {
      type: 'string',
      desc: 'Tag or branch to clone',
      requiresArg: true,
    })
    .option('github-repository', {
      type: 'string',
      desc: 'GitHub repository as owner/repo',
      requiresArg: true,
    })
    .option('git-repository', {
      type: 'string',
      desc: 'Git repository URL',
      requiresArg: true,
    })
    .option('url', {
      type: 'string',
      desc: 'Archive URL (.zip, .tar, .tar.gz, .tgz)',
      requiresArg: true,
    })
    .option('keep-updated', {
      type: 'boolean',
      desc: 'Pull the latest changes into an existing git checkout',
      default: false,
    })
    .option('options', {
      type: 'string',
      array: true,
      desc: "Build options as 'NAME VALUE', not part of the package identity",
    })
    .option('package', {
      type: 'string',
      desc: 'With clear: only remove this package',
      requiresArg: true,
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      desc: 'Increase logging verbosity',
      default: false,
    })
    .help()
    .strict()
    .showHelpOnFail(false)
    .parseSync();

  logger.setVerbose(argv.verbose);

  const command = argv._[0];
  switch (command) {
    case 'fetch':
      await fetch({
        logger,
        cacheDir: argv.cacheDir,
        name: argv.name,
        version: argv.version,
        gitTag: argv.gitTag,
        githubRepository: argv.githubRepository,
        gitRepository: argv.gitRepository,
        url: argv.url,
        keepUpdated: argv.keepUpdated,
        options: argv.options,
      });
      break;
    case 'clear':
      await clear({
        logger,
        cacheDir: argv.cacheDir,
        packageName: argv.package,
      });
      break;
    default:
      throw new SimpleError(`Unknown command: ${command}`);
  }
}

main().catch(e => {
  if (e instanceof SimpleError) {
    logger.error(e.message);
  } else {
    // eslint-disable-next-line no-console
    console.error(e);
  }
  process.exitCode = 1;
});
