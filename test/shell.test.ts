import { renderCommand, runCommand } from '../lib/util/shell';

test('nonzero exit is reported, not thrown', async () => {
  const result = await runCommand(['sh', '-c', 'echo oops >&2; exit 3']);

  expect(result).toEqual({ exitCode: 3, stdout: '', stderr: 'oops\n', timedOut: false });
});

test('output and environment of a successful command', async () => {
  const result = await runCommand(['sh', '-c', 'echo "$GREETING"'], { env: { GREETING: 'hello' } });

  expect(result).toEqual({ exitCode: 0, stdout: 'hello\n', stderr: '', timedOut: false });
});

test('command runs in the given directory', async () => {
  const result = await runCommand(['pwd'], { cwd: '/' });

  expect(result.stdout).toEqual('/\n');
});

test('timeout kills the command', async () => {
  const result = await runCommand(['sleep', '5'], { timeoutMs: 100 });

  expect(result).toMatchObject({ exitCode: -1, timedOut: true });
});

test('missing program', async () => {
  const result = await runCommand(['no-such-binary-for-srccache']);

  expect(result).toMatchObject({
    exitCode: -1,
    timedOut: false,
    stderr: 'spawn no-such-binary-for-srccache ENOENT',
  });
});

test('empty command line is a programming error', async () => {
  await expect(runCommand([])).rejects.toThrow('runCommand: empty command line');
});

test('arguments with spaces are quoted for display', () => {
  expect(renderCommand(['git', 'clone', 'my repo'])).toEqual('git clone "my repo"');
});
