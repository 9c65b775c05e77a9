// Configuration for the supervisor loop
// Defaults reproduce the plain deploy loop: `git fetch origin main`, `python ./bot_main.py`

import { SupervisorConfig } from '../domain/types/types';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export const DEFAULT_REMOTE = 'origin';
export const DEFAULT_BRANCH = 'main';
export const RESET_REF = 'FETCH_HEAD';
export const DEFAULT_WORKER_COMMAND = 'python';
export const DEFAULT_WORKER_ARGS: readonly string[] = ['./bot_main.py'];

export type SupervisorConfigOverrides = Partial<Omit<SupervisorConfig, 'resetRef'>>;

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function splitArgs(value: string | undefined): string[] | undefined {
  const text = nonEmpty(value);
  return text === undefined ? undefined : text.split(/\s+/);
}

/**
 * Merge defaults, environment and explicit overrides (highest precedence).
 * Throws ConfigurationError for values the loop cannot run with.
 */
export function loadSupervisorConfig(
  env: Env = process.env,
  overrides: SupervisorConfigOverrides = {},
  defaultCwd: string = process.cwd()
): SupervisorConfig {
  const config: SupervisorConfig = {
    cwd: overrides.cwd ?? nonEmpty(env.SUPERVISOR_CWD) ?? defaultCwd,
    remote: overrides.remote ?? nonEmpty(env.SUPERVISOR_REMOTE) ?? DEFAULT_REMOTE,
    branch: overrides.branch ?? nonEmpty(env.SUPERVISOR_BRANCH) ?? DEFAULT_BRANCH,
    resetRef: RESET_REF,
    workerCommand: overrides.workerCommand ?? nonEmpty(env.SUPERVISOR_WORKER_COMMAND) ?? DEFAULT_WORKER_COMMAND,
    workerArgs: overrides.workerArgs ?? splitArgs(env.SUPERVISOR_WORKER_ARGS) ?? [...DEFAULT_WORKER_ARGS],
  };

  validateSupervisorConfig(config);
  return config;
}

export function validateSupervisorConfig(config: SupervisorConfig): void {
  if (config.workerCommand.trim().length === 0) {
    throw new ConfigurationError('Worker command must not be empty');
  }
  if (config.remote.trim().length === 0) {
    throw new ConfigurationError('Remote name must not be empty');
  }
  if (config.branch.trim().length === 0) {
    throw new ConfigurationError('Branch name must not be empty');
  }
  // Both are passed to git as positional arguments
  for (const [name, value] of [['Remote name', config.remote], ['Branch name', config.branch]] as const) {
    if (value.startsWith('-')) {
      throw new ConfigurationError(`${name} must not start with '-': ${value}`);
    }
  }
  if (config.cwd.trim().length === 0) {
    throw new ConfigurationError('Working directory must not be empty');
  }
}
