import { tmpdir } from 'node:os';
import { createLineBuffer, runProcess, SPAWN_FAILURE_EXIT_CODE } from './process-runner';

const baseEnv = { PATH: process.env.PATH ?? '/usr/bin:/bin' };

describe('createLineBuffer', () => {
  it('emits complete lines and holds a partial one until flushed', () => {
    const lines: string[] = [];
    const buffer = createLineBuffer((line) => lines.push(line));

    buffer.write('first\nsec');
    expect(lines).toEqual(['first']);
    buffer.write('ond\r\nthi');
    expect(lines).toEqual(['first', 'second']);
    buffer.flush();
    expect(lines).toEqual(['first', 'second', 'thi']);
  });
});

describe('runProcess', () => {
  it('captures output verbatim and reports the exit code', async () => {
    const lines: string[] = [];
    const result = await runProcess('echo hello; echo oops >&2; exit 3', {
      cwd: tmpdir(),
      env: baseEnv,
      killGraceMs: 100,
      onLine: (stream, line) => lines.push(`${stream}:${line}`),
    });

    expect(result).toEqual({ exitCode: 3, stdout: 'hello\n', stderr: 'oops\n', cancelled: false });
    expect(lines.sort()).toEqual(['stderr:oops', 'stdout:hello']);
  });

  it('keeps a multi-byte character whole when it arrives in two writes', async () => {
    const lines: string[] = [];
    const result = await runProcess("printf 'caf\\303'; sleep 0.2; printf '\\251\\n'", {
      cwd: tmpdir(),
      env: baseEnv,
      killGraceMs: 100,
      onLine: (_stream, line) => lines.push(line),
    });

    expect(result.stdout).toBe('caf\u00e9\n');
    expect(lines).toEqual(['caf\u00e9']);
  });

  it('runs with exactly the environment it is given', async () => {
    const result = await runProcess('echo "$GREETING-${HOME:-unset}"', {
      cwd: tmpdir(),
      env: { ...baseEnv, GREETING: 'hi' },
      killGraceMs: 100,
    });
    expect(result.stdout).toBe('hi-unset\n');
  });

  it('stops at the first failing command', async () => {
    const result = await runProcess('false\necho unreachable', {
      cwd: tmpdir(),
      env: baseEnv,
      killGraceMs: 100,
    });
    expect(result.exitCode).toBe(1);
    expect(result.stdout).toBe('');
  });

  it('uses bash with pipefail when asked', async () => {
    const result = await runProcess('false | true', {
      cwd: tmpdir(),
      env: baseEnv,
      shell: 'bash',
      killGraceMs: 100,
    });
    expect(result.exitCode).toBe(1);
  });

  it('terminates the process group when the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();
    setTimeout(() => controller.abort('signal'), 100);

    const result = await runProcess('sleep 10', {
      cwd: tmpdir(),
      env: baseEnv,
      signal: controller.signal,
      killGraceMs: 100,
    });

    expect(result.cancelled).toBe(true);
    expect(result.exitCode).not.toBe(0);
    expect(Date.now() - started).toBeLessThan(5_000);
  });

  it('does not start when the signal already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await runProcess('echo never', {
      cwd: tmpdir(),
      env: baseEnv,
      signal: controller.signal,
      killGraceMs: 100,
    });
    expect(result).toEqual({ exitCode: 1, stdout: '', stderr: '', cancelled: true });
  });

  it('reports a shell that cannot be started as exit 127', async () => {
    const result = await runProcess('echo hi', {
      cwd: tmpdir(),
      env: baseEnv,
      shell: 'relay-no-such-shell',
      killGraceMs: 100,
    });
    expect(result.exitCode).toBe(SPAWN_FAILURE_EXIT_CODE);
    expect(result.cancelled).toBe(false);
  });
});
