// Type definitions for the supervisor loop and its collaborators

export interface CommandResult {
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
  passed: boolean;
}

export type StatusEntryKind =
  | 'staged'
  | 'unstaged'
  | 'staged+unstaged'
  | 'untracked'
  | 'ignored';

export interface StatusEntry {
  path: string;
  origPath?: string; // Set for renames and copies
  index: string; // X column of porcelain v1
  workTree: string; // Y column of porcelain v1
  kind: StatusEntryKind;
}

export interface WorkingTreeStatus {
  clean: boolean;
  entries: StatusEntry[];
  result: CommandResult;
}

export type SyncSkipReason = 'DIRTY_WORKING_TREE';

export type SyncOutcome =
  | {
      action: 'skipped';
      reason: SyncSkipReason;
      entries: StatusEntry[];
    }
  | {
      action: 'fetch-failed';
      fetch: CommandResult;
    }
  | {
      action: 'reset';
      fetch: CommandResult;
      reset: CommandResult;
    }
  | {
      // A port threw instead of returning a result
      action: 'errored';
      error: string;
    };

export interface WorkerExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: string; // Spawn failure, e.g. ENOENT
  durationMs: number;
}

export interface IterationReport {
  iteration: number;
  sync: SyncOutcome;
  /** null when shutdown was requested before the worker started */
  worker: WorkerExit | null;
}

export interface SupervisorConfig {
  cwd: string;
  remote: string;
  branch: string;
  resetRef: string;
  workerCommand: string;
  workerArgs: string[];
}
