import * as child_process from 'child_process';
import * as util from 'util';

const cpExecFile = util.promisify(child_process.execFile);

export interface CommandOptions {
  readonly cwd?: string;
  /**
   * Extra variables, merged over the current environment
   */
  readonly env?: Record<string, string>;
  readonly timeoutMs?: number;
}

export interface CommandResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;
}

/**
 * Runs a program without a shell and reports how it ended
 *
 * Never rejects for a nonzero exit or a timeout; those show up in the result.
 */
export type CommandRunner = (argv: readonly string[], options?: CommandOptions) => Promise<CommandResult>;

export const runCommand: CommandRunner = async (argv, options = {}) => {
  const [program, ...args] = argv;
  if (program === undefined) {
    throw new Error('runCommand: empty command line');
  }

  try {
    const { stdout, stderr } = await cpExecFile(program, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      timeout: options.timeoutMs,
      maxBuffer: 64 * 1024 * 1024,
      encoding: 'utf-8',
    });
    return { exitCode: 0, stdout, stderr, timedOut: false };
  } catch (e) {
    if (!isExecError(e)) { throw e; }
    return {
      exitCode: typeof e.code === 'number' ? e.code : -1,
      stdout: e.stdout ?? '',
      stderr: e.stderr || e.message,
      timedOut: e.killed === true && e.signal === 'SIGTERM',
    };
  }
};

interface ExecError extends Error {
  readonly code?: number | string;
  readonly killed?: boolean;
  readonly signal?: string;
  readonly stdout?: string;
  readonly stderr?: string;
}

/**
 * No instanceof: child_process errors may come from another realm under Jest
 */
function isExecError(e: unknown): e is ExecError {
  return typeof e === 'object' && e !== null && 'message' in e && ('stdout' in e || 'killed' in e || 'code' in e);
}

export function renderCommand(argv: readonly string[]) {
  return argv.map(a => /[\s"']/.test(a) ? JSON.stringify(a) : a).join(' ');
}
