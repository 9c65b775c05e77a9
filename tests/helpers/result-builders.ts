import { CommandResult, WorkerExit } from '@/domain/types/types';

export function commandResult(command: string, overrides: Partial<CommandResult> = {}): CommandResult {
  const exitCode = overrides.exitCode ?? 0;
  return {
    command,
    exitCode,
    stdout: '',
    stderr: '',
    passed: exitCode === 0,
    ...overrides,
  };
}

export function workerExit(overrides: Partial<WorkerExit> = {}): WorkerExit {
  return {
    code: 0,
    signal: null,
    durationMs: 5,
    ...overrides,
  };
}
