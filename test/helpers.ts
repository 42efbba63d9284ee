import archiver from 'archiver';
import { createWriteStream, promises as fs } from 'fs';
import * as http from 'http';
import * as os from 'os';
import * as path from 'path';
import * as tar from 'tar';
import { ArchiveBackend, GitBackend } from '../lib/package-orchestrator';
import { Downloader } from '../lib/fetchers/archive-acquirer';
import { CommandOptions, CommandResult } from '../lib/util/shell';

export async function makeTmpDir(prefix = 'srccache-test-'): Promise<string> {
  return fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
}

export async function writeFiles(root: string, files: Record<string, string>) {
  for (const [rel, contents] of Object.entries(files)) {
    const full = path.join(root, rel);
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.writeFile(full, contents, { encoding: 'utf-8' });
  }
}

export async function pathExists(p: string) {
  try {
    await fs.lstat(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Gzipped tarball of 'files', rooted at the first path component of each
 */
export async function makeTarGz(outFile: string, files: Record<string, string>) {
  const staging = await makeTmpDir('srccache-stage-');
  await writeFiles(staging, files);
  const topLevel = Array.from(new Set(Object.keys(files).map(f => f.split('/')[0])));
  await tar.c({ gzip: true, file: outFile, cwd: staging }, topLevel);
  await fs.rm(staging, { recursive: true, force: true });
}

export async function makeZip(outFile: string, files: Record<string, string>) {
  const archive = archiver('zip');
  const out = createWriteStream(outFile);
  const done = new Promise<void>((ok, ko) => {
    out.on('close', () => ok());
    out.on('error', ko);
    archive.on('error', ko);
  });
  archive.pipe(out);
  for (const [name, contents] of Object.entries(files)) {
    archive.append(contents, { name });
  }
  await archive.finalize();
  await done;
}

/**
 * "Downloads" by copying a local file, or fails
 */
export class FakeDownloader implements Downloader {
  public readonly calls = new Array<{ url: string; destPath: string; retries?: number }>();

  constructor(private readonly sourceFile: string | Error) {
  }

  public async fetch(url: string, destPath: string, retries?: number): Promise<void> {
    this.calls.push({ url, destPath, retries });
    if (this.sourceFile instanceof Error) {
      await fs.writeFile(destPath, 'partial');
      throw this.sourceFile;
    }
    await fs.copyFile(this.sourceFile, destPath);
  }
}

export interface RecordedCommand {
  readonly argv: readonly string[];
  readonly options?: CommandOptions;
}

/**
 * Records command lines; answers from 'respond' (default: success)
 */
export class FakeRunner {
  public readonly calls = new Array<RecordedCommand>();

  constructor(private readonly respond: (argv: readonly string[]) => Partial<CommandResult> = () => ({})) {
  }

  public readonly run = async (argv: readonly string[], options?: CommandOptions): Promise<CommandResult> => {
    this.calls.push({ argv, options });
    return { exitCode: 0, stdout: '', stderr: '', timedOut: false, ...this.respond(argv) };
  };
}

/**
 * A git backend that materializes a directory with a marker file
 */
export class FakeGit implements GitBackend {
  public readonly clones = new Array<{ name: string; repoUrl: string; dest: string; tag?: string }>();
  public readonly updates = new Array<string>();
  public updateResult = true;
  public cloneError?: Error;

  public async clone(name: string, repoUrl: string, dest: string, tag?: string): Promise<void> {
    this.clones.push({ name, repoUrl, dest, tag });
    await writeFiles(dest, { 'CMakeLists.txt': `# ${repoUrl}@${tag ?? 'HEAD'}\n` });
    if (this.cloneError) { throw this.cloneError; }
  }

  public async update(dest: string): Promise<boolean> {
    this.updates.push(dest);
    return this.updateResult;
  }
}

export class FakeArchive implements ArchiveBackend {
  public readonly fetches = new Array<{ name: string; url: string; destDir: string }>();

  public async fetch(name: string, url: string, destDir: string): Promise<void> {
    this.fetches.push({ name, url, destDir });
    await writeFiles(destDir, { 'README.md': url });
  }
}

export interface TestServer {
  readonly url: string;
  readonly requests: string[];
  close(): Promise<void>;
}

/**
 * An HTTP server on 127.0.0.1, inside the test process
 */
export async function startServer(handler: (req: http.IncomingMessage, res: http.ServerResponse, n: number) => void): Promise<TestServer> {
  const requests = new Array<string>();
  const server = http.createServer((req, res) => {
    requests.push(req.url ?? '');
    handler(req, res, requests.length);
  });
  await new Promise<void>(ok => server.listen(0, '127.0.0.1', () => ok()));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error(`Unexpected server address: ${address}`);
  }
  const port = address.port;

  return {
    url: `http://127.0.0.1:${port}`,
    requests,
    close: () => new Promise<void>((ok, ko) => {
      server.closeAllConnections();
      server.close(err => err ? ko(err) : ok());
    }),
  };
}
