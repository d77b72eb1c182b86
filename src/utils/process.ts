/**
 * Run a child process with a stdin payload and collect its output.
 */
import { spawn } from 'node:child_process';

export interface RunProcessOptions {
  /** Written to stdin, which is then closed */
  input?: string;
  /** Hard timeout (ms); the child is SIGKILLed on expiry */
  timeoutMs?: number;
  /** Extra environment variables, layered over the parent's */
  env?: Record<string, string>;
  cwd?: string;
}

export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/**
 * Spawn `command` without a shell. Resolves once the child has closed (or,
 * after a timeout, exited), whatever its exit status; rejects only when it
 * cannot be started.
 */
export function runProcess(
  command: string,
  args: readonly string[],
  options: RunProcessOptions = {}
): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    let settled = false;
    let timedOut = false;
    let stdout = '';
    let stderr = '';

    const child = spawn(command, args, {
      stdio: ['pipe', 'pipe', 'pipe'],
      cwd: options.cwd,
      env: options.env ? { ...process.env, ...options.env } : process.env,
    });

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    const timer = options.timeoutMs === undefined
      ? undefined
      : setTimeout(() => {
          timedOut = true;
          child.kill('SIGKILL');
        }, options.timeoutMs);
    timer?.unref();

    const finish = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      fn();
    };

    child.on('error', (err) => {
      finish(() => reject(err));
    });

    // A grandchild can hold the pipes open past the kill; stop waiting for them.
    child.on('exit', (code, signal) => {
      if (!timedOut) return;
      child.stdout.destroy();
      child.stderr.destroy();
      finish(() => resolve({ exitCode: code, signal, stdout, stderr, timedOut }));
    });

    child.on('close', (code, signal) => {
      finish(() => resolve({ exitCode: code, signal, stdout, stderr, timedOut }));
    });

    // A child that exits without reading stdin makes the write fail with EPIPE.
    child.stdin.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code !== 'EPIPE') {
        finish(() => reject(err));
      }
    });
    child.stdin.end(options.input ?? '');
  });
}
