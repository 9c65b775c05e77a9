// Port: Command Executor
// Interface for executing OS commands with captured output

import { CommandResult } from '../types/types';

export interface CommandExecutorPort {
  /**
   * Execute a single command (no shell) and capture its output.
   * Resolves for non-zero exits too; `passed` carries the outcome.
   */
  execute(file: string, args: string[], cwd: string): Promise<CommandResult>;
}
