import { spawn, type ChildProcess } from 'node:child_process';
import treeKill from 'tree-kill';
import { getLogger } from '../logger';

export interface CommandOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
  maxBuffer?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

function killTree(child: ChildProcess): void {
  if (!child.pid) return;
  treeKill(child.pid, 'SIGKILL', (err) => {
    if (err) getLogger('core').debug('process.kill.failed', { pid: child.pid, error: err.message });
  });
}

/**
 * Spawn an external tool and capture its output. A non-zero exit code is
 * reported, not thrown; a missing binary or an abort rejects.
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  const { cwd, env, timeoutMs = 120_000, signal, maxBuffer = 1024 * 1024 } = options;
  return new Promise<CommandResult>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error(`${command} aborted before start`));
      return;
    }
    const child = spawn(command, args, {
      cwd,
      env: { ...process.env, ...env },
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;

    const finish = (fn: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      fn();
    };

    const timer = setTimeout(() => {
      timedOut = true;
      killTree(child);
    }, timeoutMs);

    const onAbort = () => {
      killTree(child);
      finish(() => reject(new Error(`${command} aborted`)));
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    // Output beyond maxBuffer is dropped; only the head is kept for diagnostics.
    child.stdout?.on('data', (chunk: Buffer) => {
      if (stdout.length < maxBuffer) stdout += chunk.toString();
    });
    child.stderr?.on('data', (chunk: Buffer) => {
      if (stderr.length < maxBuffer) stderr += chunk.toString();
    });

    child.on('error', (err) => finish(() => reject(err)));
    child.on('close', (code) => {
      finish(() => resolve({ stdout, stderr, exitCode: code ?? -1, timedOut }));
    });
  });
};
