// Process Runner - spawn a long-running program with inherited stdio and wait for it

import { spawn, ChildProcess } from 'child_process';
import { WorkerExit } from '../../../../domain/types/types';
import { log as logShared, logError } from '../../../adapters/logging/logger';

function log(message: string, ...args: unknown[]): void {
  logShared('ProcessRunner', message, ...args);
}

export interface RunningProcess {
  child: ChildProcess;
  exited: Promise<WorkerExit>;
}

/**
 * Start `command args...` in `cwd`. The returned promise settles exactly once,
 * after the process has closed, or immediately when it could not be spawned.
 */
export function startProcess(command: string, args: string[], cwd: string): RunningProcess {
  const startTime = Date.now();
  const child = spawn(command, args, {
    cwd,
    env: process.env,
    stdio: 'inherit',
  });

  const exited = new Promise<WorkerExit>((resolve) => {
    let settled = false;
    const settle = (exit: Omit<WorkerExit, 'durationMs'>): void => {
      if (settled) return;
      settled = true;
      resolve({ ...exit, durationMs: Date.now() - startTime });
    };

    child.on('close', (code, signal) => {
      settle({ code, signal });
    });

    child.on('error', (error) => {
      if (child.pid === undefined) {
        // Never started; no 'close' is guaranteed to follow
        logError('ProcessRunner', `Failed to start ${command}`, error);
        settle({ code: null, signal: null, error: error.message });
        return;
      }
      // Running process (e.g. a failed kill): keep waiting for close
      logError('ProcessRunner', `Process ${child.pid} reported an error`, error);
    });
  });

  if (child.pid !== undefined) {
    log(`Started ${command} ${args.join(' ')} (PID: ${child.pid})`);
  }

  return { child, exited };
}
