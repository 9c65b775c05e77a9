// Command Executor - run a single command (no shell) and capture its output
// Never rejects: non-zero exits and spawn errors come back as a failed CommandResult

import { CommandResult } from '../../../../domain/types/types';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { log as logShared, logVerbose, logPerformance } from '../../../adapters/logging/logger';

const execFileAsync = promisify(execFile);

const MAX_BUFFER_BYTES = 10 * 1024 * 1024; // 10MB buffer

function log(message: string, ...args: unknown[]): void {
  logShared('CommandExecutor', message, ...args);
}

interface ExecFailure {
  message: string;
  code?: number | string;
  stdout?: string;
  stderr?: string;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return typeof error === 'object' && error !== null && 'message' in error;
}

function textOf(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

export function formatCommand(file: string, args: string[]): string {
  return [file, ...args].join(' ');
}

/**
 * Execute `file args...` in `cwd`.
 * Only trailing whitespace is trimmed from the output: leading columns can be significant.
 */
export async function executeCommand(file: string, args: string[], cwd: string): Promise<CommandResult> {
  const command = formatCommand(file, args);
  const startTime = Date.now();
  logVerbose('CommandExecutor', 'Executing command', { command, cwd });

  try {
    const { stdout, stderr } = await execFileAsync(file, args, {
      cwd,
      maxBuffer: MAX_BUFFER_BYTES,
      encoding: 'utf8',
    });
    logPerformance(`[CommandExecutor] ${command}`, Date.now() - startTime, { exit_code: 0 });

    return {
      command,
      exitCode: 0,
      stdout: stdout.trimEnd(),
      stderr: stderr.trimEnd(),
      passed: true,
    };
  } catch (error) {
    // execFile rejects on non-zero exit, on signals and when the binary cannot be spawned
    const failure: ExecFailure = isExecFailure(error) ? error : { message: String(error) };
    const exitCode = typeof failure.code === 'number' ? failure.code : 1;
    const stderr = textOf(failure.stderr).trimEnd();

    log(`Command failed: ${command} (exit code ${exitCode})`);
    logPerformance(`[CommandExecutor] ${command}`, Date.now() - startTime, {
      exit_code: exitCode,
      error_code: failure.code,
    });

    return {
      command,
      exitCode,
      stdout: textOf(failure.stdout).trimEnd(),
      stderr: stderr.length > 0 ? stderr : failure.message,
      passed: false,
    };
  }
}
