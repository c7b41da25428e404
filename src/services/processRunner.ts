import { spawn } from 'child_process';
import { EnvironmentError, TimeoutError, UnexpectedError } from '../utils/errors';
import type { ProcessResult, RunProcessOptions } from '../types';

const DEFAULT_KILL_GRACE_MS = 5_000;
const NOT_STARTABLE = new Set(['ENOENT', 'EACCES']);

function errorCode(err: Error): string | undefined {
  return 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

/**
 * Spawn a command with captured output and a hard deadline.
 *
 * On timeout the child gets SIGTERM, then SIGKILL after `killGraceMs`.
 * The returned promise only rejects with TimeoutError once the child has
 * actually exited, so callers can safely delete anything it was using.
 */
export function runProcess(command: string, args: string[], options: RunProcessOptions): Promise<ProcessResult> {
  const { timeoutMs, killGraceMs = DEFAULT_KILL_GRACE_MS, cwd, onSpawn } = options;

  return new Promise((resolve, reject) => {
    const startedAt = Date.now();
    const child = spawn(command, args, { cwd, stdio: ['ignore', 'pipe', 'pipe'] });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;
    let killTimer: NodeJS.Timeout | undefined;

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => { stdout += chunk; });
    child.stderr.on('data', (chunk: string) => { stderr += chunk; });

    const deadline = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      killTimer = setTimeout(() => {
        child.kill('SIGKILL');
      }, killGraceMs);
    }, timeoutMs);

    const finish = (outcome: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(deadline);
      if (killTimer) clearTimeout(killTimer);
      outcome();
    };

    child.on('spawn', () => {
      if (child.pid !== undefined) onSpawn?.(child.pid);
    });

    child.on('error', (err) => {
      // once the child is running, 'close' still follows and reports the outcome
      if (child.pid !== undefined) return;
      const code = errorCode(err);
      if (code && NOT_STARTABLE.has(code)) {
        finish(() => reject(new EnvironmentError(
          `Command "${command}" could not be started (${code}). Is it installed?`,
          { cause: err }
        )));
        return;
      }
      finish(() => reject(new UnexpectedError(`Failed to start "${command}": ${err.message}`, { cause: err })));
    });

    child.on('close', (exitCode, signal) => {
      const durationMs = Date.now() - startedAt;
      if (timedOut) {
        finish(() => reject(new TimeoutError(`Conversion timed out after ${timeoutMs} ms.`)));
        return;
      }
      finish(() => resolve({ exitCode, signal, stdout, stderr, durationMs }));
    });
  });
}
