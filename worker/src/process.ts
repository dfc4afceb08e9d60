/**
 * Process execution for the opaque simulator binary.
 */

import { spawn, ChildProcess } from 'child_process';
import { createLogger } from '../../api/lib/logger';
import type { ProcessResult } from './types';

const log = createLogger('Process');

/** Grace period between SIGTERM and SIGKILL on timeout */
const KILL_GRACE_MS = 5000;

/**
 * Run a process and wait for it to complete.
 * Uses stdio: 'inherit' so output goes to the parent's terminal.
 * A timed-out process reports exit code 124; one killed by a signal
 * reports 128 + the signal number.
 */
export function runProcess(
  command: string,
  args: string[],
  options: {
    env?: NodeJS.ProcessEnv;
    cwd?: string;
    timeout?: number;
  } = {},
): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const startTime = Date.now();
    let timedOut = false;

    log.info('Running', { command: `${command} ${args.join(' ')}` });

    const proc: ChildProcess = spawn(command, args, {
      stdio: 'inherit',
      env: { ...process.env, ...options.env },
      cwd: options.cwd,
    });

    let timeoutId: NodeJS.Timeout | null = null;
    if (options.timeout) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        log.error('Process timed out, killing', { timeoutMs: options.timeout });
        proc.kill('SIGTERM');
        setTimeout(() => proc.kill('SIGKILL'), KILL_GRACE_MS).unref();
      }, options.timeout);
    }

    proc.on('error', (error) => {
      if (timeoutId) clearTimeout(timeoutId);
      reject(error);
    });

    proc.on('close', (code, signal) => {
      if (timeoutId) clearTimeout(timeoutId);
      let exitCode: number;
      if (timedOut) {
        exitCode = 124;
      } else if (code !== null) {
        exitCode = code;
      } else if (signal) {
        exitCode = 128 + (signal === 'SIGTERM' ? 15 : signal === 'SIGKILL' ? 9 : 1);
      } else {
        exitCode = 0;
      }
      resolve({ exitCode, durationMs: Date.now() - startTime });
    });
  });
}
