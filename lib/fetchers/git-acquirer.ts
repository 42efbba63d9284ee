import { promises as fs } from 'fs';
import * as path from 'path';
import { isDirectory } from '../util/files';
import { FetchError } from '../util/flow';
import { Logger } from '../util/log';
import { errorMessage } from '../util/runtime';
import { CommandResult, CommandRunner, renderCommand, runCommand } from '../util/shell';
import { Timer } from '../util/timer';

/**
 * Abort transfers slower than 1000 bytes/s for 10 seconds
 */
const TRANSPORT_ENV: Record<string, string> = {
  GIT_HTTP_LOW_SPEED_LIMIT: '1000',
  GIT_HTTP_LOW_SPEED_TIME: '10',
};

export interface GitTimeouts {
  readonly cloneMs: number;
  readonly fetchMs: number;
  readonly resetMs: number;
  readonly submoduleMs: number;
}

export const DEFAULT_GIT_TIMEOUTS: GitTimeouts = {
  cloneMs: 600_000,
  fetchMs: 120_000,
  resetMs: 30_000,
  submoduleMs: 120_000,
};

export interface GitAcquirerOptions {
  readonly timeouts?: Partial<GitTimeouts>;
  readonly runner?: CommandRunner;
  /**
   * @default 'git'
   */
  readonly gitBinary?: string;
}

/**
 * Shallow clones and in-place updates of git-backed packages
 */
export class GitAcquirer {
  private readonly timeouts: GitTimeouts;
  private readonly runner: CommandRunner;
  private readonly git: string;

  constructor(private readonly logger: Logger, options: GitAcquirerOptions = {}) {
    this.timeouts = { ...DEFAULT_GIT_TIMEOUTS, ...options.timeouts };
    this.runner = options.runner ?? runCommand;
    this.git = options.gitBinary ?? 'git';
  }

  /**
   * Depth-1 single-branch clone including (shallow) submodules
   */
  public async clone(name: string, repoUrl: string, dest: string, tag?: string): Promise<void> {
    this.logger.info(`Cloning repository: ${repoUrl}`);
    if (tag) {
      this.logger.info(`Using tag/branch: ${tag}`);
    }

    const argv = [
      this.git, 'clone',
      ...(tag ? ['--branch', tag] : []),
      '--recurse-submodules',
      '--quiet',
      '--shallow-submodules',
      '--single-branch',
      '--depth', '1',
      repoUrl,
      dest,
    ];

    await fs.mkdir(path.dirname(dest), { recursive: true });
    this.logger.info(`Executing ${renderCommand(argv)}`);
    const timer = new Timer(`Cloned ${name}`);
    const result = await this.runner(argv, { env: TRANSPORT_ENV, timeoutMs: this.timeouts.cloneMs });

    if (result.exitCode !== 0) {
      throw new FetchError('vcs', `Failed to clone ${name} from ${repoUrl}: ${describeFailure(result, this.timeouts.cloneMs)}`);
    }
    this.logger.info('Repository cloned successfully');
    this.logger.debug(timer.stop().toString());
  }

  /**
   * Bring an existing clone to the tip of the remote's default branch
   *
   * Never throws. A failed fetch or reset returns false so the caller can
   * refetch; a failed submodule update is only a warning.
   */
  public async update(dest: string): Promise<boolean> {
    if (!await isDirectory(dest)) { return false; }

    this.logger.info(`Updating repository at: ${dest}`);
    try {
      this.logger.info('Fetching all changes...');
      const fetched = await this.runGit(dest, ['fetch', '--all', '--quiet'], this.timeouts.fetchMs);
      if (fetched.exitCode !== 0) {
        this.logger.error(`Update failed: git fetch: ${describeFailure(fetched, this.timeouts.fetchMs)}`);
        return false;
      }

      this.logger.info('Resetting to latest...');
      const reset = await this.runGit(dest, ['reset', '--hard', 'origin/HEAD', '--quiet'], this.timeouts.resetMs);
      if (reset.exitCode !== 0) {
        this.logger.error(`Update failed: git reset: ${describeFailure(reset, this.timeouts.resetMs)}`);
        return false;
      }

      this.logger.info('Updating submodules...');
      const submodules = await this.runGit(dest, ['submodule', 'update', '--init', '--recursive', '--quiet'], this.timeouts.submoduleMs);
      if (submodules.exitCode !== 0) {
        this.logger.warning(`Submodule update failed, keeping the updated tree: ${describeFailure(submodules, this.timeouts.submoduleMs)}`);
      }
    } catch (e) {
      this.logger.error(`Update failed: ${errorMessage(e)}`);
      return false;
    }

    this.logger.info('Repository updated successfully');
    return true;
  }

  private runGit(cwd: string, args: string[], timeoutMs: number) {
    return this.runner([this.git, ...args], { cwd, env: TRANSPORT_ENV, timeoutMs });
  }
}

function describeFailure(result: CommandResult, timeoutMs: number) {
  if (result.timedOut) {
    return `timed out after ${timeoutMs / 1000}s`;
  }
  const output = result.stderr.trim() || result.stdout.trim();
  return output ? output : `exit code ${result.exitCode}`;
}
