import { spawn } from 'node:child_process';

export type OutputStream = 'stdout' | 'stderr';

export interface ProcessOptions {
  cwd: string;
  env: Record<string, string>;
  /** Shell binary; the command is passed as `-c <command>` */
  shell?: string;
  signal?: AbortSignal;
  /** Time between SIGTERM and SIGKILL once the signal aborts */
  killGraceMs: number;
  onLine?: (stream: OutputStream, line: string) => void;
}

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  cancelled: boolean;
}

/** Exit code reported when the process could not be started at all. */
export const SPAWN_FAILURE_EXIT_CODE = 127;

export function createLineBuffer(onLine: (line: string) => void) {
  let buffer = '';

  return {
    write(chunk: string) {
      buffer += chunk;

      // Split into complete lines; keep the last partial line in buffer.
      const parts = buffer.split(/\r?\n/);
      buffer = parts.pop() ?? '';

      for (const part of parts) {
        onLine(part);
      }
    },
    flush() {
      const remaining = buffer;
      buffer = '';
      if (remaining.length > 0) onLine(remaining);
    },
  };
}

function shellArgs(shell: string | undefined, command: string): [string, string[]] {
  if (!shell || shell === 'sh') return ['sh', ['-e', '-c', command]];
  if (shell === 'bash') return ['bash', ['--noprofile', '--norc', '-eo', 'pipefail', '-c', command]];
  return [shell, ['-c', command]];
}

/**
 * Runs a shell command in its own process group, captures stdout/stderr verbatim and
 * reports them line by line. Aborting the signal sends SIGTERM to the whole group and
 * SIGKILL after killGraceMs if it is still alive.
 */
export function runProcess(command: string, options: ProcessOptions): Promise<ProcessResult> {
  const { signal, killGraceMs, onLine } = options;

  if (signal?.aborted) {
    return Promise.resolve({ exitCode: 1, stdout: '', stderr: '', cancelled: true });
  }

  return new Promise<ProcessResult>((resolve) => {
    const [file, args] = shellArgs(options.shell, command);
    const child = spawn(file, args, {
      cwd: options.cwd,
      env: options.env,
      detached: process.platform !== 'win32',
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let killTimer: ReturnType<typeof setTimeout> | null = null;
    let settled = false;

    const stdoutBuffer = createLineBuffer((line) => onLine?.('stdout', line));
    const stderrBuffer = createLineBuffer((line) => onLine?.('stderr', line));

    // decoded per stream, so a character split across chunks stays whole
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (text: string) => {
      stdout += text;
      stdoutBuffer.write(text);
    });
    child.stderr.on('data', (text: string) => {
      stderr += text;
      stderrBuffer.write(text);
    });

    const kill = (sig: NodeJS.Signals) => {
      if (child.pid === undefined) return;
      if (process.platform === 'win32') {
        child.kill(sig);
        return;
      }
      try {
        process.kill(-child.pid, sig);
      } catch (err) {
        // group already gone; fall back to the direct child otherwise
        if (!isNoSuchProcess(err)) child.kill(sig);
      }
    };

    const onAbort = () => {
      kill('SIGTERM');
      killTimer = setTimeout(() => kill('SIGKILL'), killGraceMs);
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const finish = (exitCode: number) => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener('abort', onAbort);
      if (killTimer) clearTimeout(killTimer);
      // Flush any partial line that didn't end in \n
      stdoutBuffer.flush();
      stderrBuffer.flush();
      resolve({ exitCode, stdout, stderr, cancelled: signal?.aborted ?? false });
    };

    child.on('close', (code, sig) => {
      finish(code ?? (sig ? 128 + signalNumber(sig) : 1));
    });
    child.on('error', (err) => {
      stderr += `${err.message}\n`;
      stderrBuffer.write(`${err.message}\n`);
      finish(SPAWN_FAILURE_EXIT_CODE);
    });
  });
}

function isNoSuchProcess(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ESRCH';
}

function signalNumber(sig: NodeJS.Signals): number {
  switch (sig) {
    case 'SIGKILL':
      return 9;
    case 'SIGTERM':
      return 15;
    case 'SIGINT':
      return 2;
    default:
      return 0;
  }
}
