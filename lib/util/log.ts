// eslint-disable-next-line @typescript-eslint/no-require-imports
import chalk = require('chalk');

/**
 * Machine-readable status keys, written as `KEY:value` lines
 */
export type StatusKey = 'REFETCH' | 'UPDATE' | 'EXISTS' | 'CACHED';

/**
 * Logging capability handed to every component
 */
export interface Logger {
  debug(s: string): void;
  info(s: string): void;
  warning(s: string): void;
  error(s: string): void;
  success(s: string): void;
  status(key: StatusKey, value: string): void;
}

export interface ConsoleLoggerOptions {
  readonly verbose?: boolean;
  readonly stdout?: NodeJS.WritableStream;
  readonly stderr?: NodeJS.WritableStream;
}

/**
 * Status and success lines go to stdout uncoloured, everything else to stderr
 *
 * Every line is a single write() call, so lines from different components
 * never interleave.
 */
export class ConsoleLogger implements Logger {
  private verbose: boolean;
  private readonly startTime = Date.now();
  private readonly stdout: NodeJS.WritableStream;
  private readonly stderr: NodeJS.WritableStream;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
  }

  public setVerbose(v: boolean) {
    this.verbose = v;
  }

  public debug(s: string) {
    if (this.verbose) {
      this.stderr.write(chalk.gray(`[${pad(6, this.elapsedTime(), ' ')}] ${s}`) + '\n');
    }
  }

  public info(s: string) {
    this.stderr.write(chalk.blue(s) + '\n');
  }

  public warning(s: string) {
    this.stderr.write(chalk.yellow(s) + '\n');
  }

  public error(s: string) {
    this.stderr.write(chalk.red(`ERROR:${s}`) + '\n');
  }

  public success(s: string) {
    this.stdout.write(`SUCCESS:${s}\n`);
  }

  public status(key: StatusKey, value: string) {
    this.stdout.write(`${key}:${value}\n`);
  }

  private elapsedTime() {
    const elapsedS = (Date.now() - this.startTime) / 1000.0;
    return elapsedS.toFixed(1);
  }
}

export type LogLevel = 'debug' | 'info' | 'warning' | 'error' | 'success' | 'status';

export interface LogLine {
  readonly level: LogLevel;
  readonly message: string;
}

/**
 * Keeps every line in memory
 */
export class MemoryLogger implements Logger {
  public readonly lines = new Array<LogLine>();

  public debug(s: string) { this.lines.push({ level: 'debug', message: s }); }
  public info(s: string) { this.lines.push({ level: 'info', message: s }); }
  public warning(s: string) { this.lines.push({ level: 'warning', message: s }); }
  public error(s: string) { this.lines.push({ level: 'error', message: s }); }
  public success(s: string) { this.lines.push({ level: 'success', message: s }); }

  public status(key: StatusKey, value: string) {
    this.lines.push({ level: 'status', message: `${key}:${value}` });
  }

  /**
   * Only the status protocol lines, in order
   */
  public get statusLines(): string[] {
    return this.messages('status');
  }

  public messages(level: LogLevel): string[] {
    return this.lines.filter(l => l.level === level).map(l => l.message);
  }
}

function pad(n: number, x: string | number, p: string = ' ') {
  const s = `${x}`;
  return p.repeat(Math.max(n - s.length, 0)) + s;
}
