// Operator CLI
// With no arguments it behaves like the plain deploy loop

import { Command } from 'commander';
import { loadSupervisorConfig, SupervisorConfigOverrides } from './config/supervisorConfig';
import { SupervisorConfig, SyncOutcome } from './domain/types/types';
import { createSupervisor, SupervisorOverrides } from './application/services/supervisorFactory';
import { supervisorLoop } from './application/services/supervisorLoop';
import { installShutdownHandlers, SignalSource } from './application/services/shutdown';
import { logVerbose as logVerboseShared, setVerbose } from './infrastructure/adapters/logging/logger';

function logVerbose(component: string, message: string, data?: Record<string, unknown>): void {
  logVerboseShared(`CLI:${component}`, message, data);
}

type GlobalOptions = {
  cwd?: string;
  remote?: string;
  branch?: string;
  worker?: string;
  workerArg?: string[];
  verbose?: boolean;
};

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

export function toOverrides(options: GlobalOptions): SupervisorConfigOverrides {
  const overrides: SupervisorConfigOverrides = {};
  if (options.cwd !== undefined) overrides.cwd = options.cwd;
  if (options.remote !== undefined) overrides.remote = options.remote;
  if (options.branch !== undefined) overrides.branch = options.branch;
  if (options.worker !== undefined) overrides.workerCommand = options.worker;
  if (options.workerArg !== undefined) overrides.workerArgs = options.workerArg;
  return overrides;
}

/**
 * Start the supervisor loop. Resolves with the process exit code once a
 * shutdown signal stopped the loop.
 */
async function start(
  config: SupervisorConfig,
  overrides: SupervisorOverrides = {},
  signals?: SignalSource
): Promise<number> {
  const supervisor = createSupervisor(config, overrides);
  logVerbose('Start', 'Starting supervisor', {
    cwd: config.cwd,
    remote: config.remote,
    branch: config.branch,
    worker: [config.workerCommand, ...config.workerArgs].join(' '),
  });

  const shutdown = installShutdownHandlers(supervisor.worker, supervisor.logger, signals);
  try {
    await supervisorLoop(supervisor, { signal: shutdown.signal });
  } finally {
    shutdown.dispose();
  }
  return shutdown.exitCode();
}

/**
 * Print working tree cleanliness and pending entries
 */
async function status(config: SupervisorConfig, overrides: SupervisorOverrides = {}): Promise<number> {
  const { workingTree } = createSupervisor(config, overrides);
  const treeStatus = await workingTree.getStatus();

  console.log(`Working tree: ${config.cwd}`);
  console.log(`Status: ${treeStatus.clean ? 'clean (next iteration will sync)' : 'dirty (sync will be skipped)'}`);
  if (!treeStatus.result.passed) {
    console.log(`Warning: ${treeStatus.result.command} exited with code ${treeStatus.result.exitCode}`);
  }
  for (const entry of treeStatus.entries) {
    const renamed = entry.origPath ? `${entry.origPath} -> ` : '';
    console.log(`  ${entry.index}${entry.workTree} ${renamed}${entry.path} (${entry.kind})`);
  }
  return 0;
}

export function describeSyncOutcome(outcome: SyncOutcome): string {
  switch (outcome.action) {
    case 'skipped':
      return `Skipped: working tree has ${outcome.entries.length} pending change(s)`;
    case 'fetch-failed':
      return `Fetch failed (exit code ${outcome.fetch.exitCode}): ${outcome.fetch.stderr}`;
    case 'reset':
      return outcome.reset.passed
        ? 'Reset to fetched reference'
        : `Reset failed (exit code ${outcome.reset.exitCode}): ${outcome.reset.stderr}`;
    case 'errored':
      return `Sync errored: ${outcome.error}`;
  }
}

export function syncExitCode(outcome: SyncOutcome): number {
  if (outcome.action === 'skipped') return 0;
  if (outcome.action === 'reset' && outcome.reset.passed) return 0;
  return 1;
}

/**
 * Run one synchronization step without starting the worker
 */
async function sync(config: SupervisorConfig, overrides: SupervisorOverrides = {}): Promise<number> {
  const { synchronizer } = createSupervisor(config, overrides);
  const outcome = await synchronizer.synchronize(1);
  console.log(describeSyncOutcome(outcome));
  return syncExitCode(outcome);
}

const program = new Command();

program
  .name('bot-supervisor')
  .description('Keep a worker program running, resyncing the working tree to upstream between runs')
  .option('--cwd <path>', 'Working tree to supervise (default: current directory)')
  .option('--remote <name>', 'Remote to fetch from (default: origin)')
  .option('--branch <name>', 'Branch to fetch (default: main)')
  .option('--worker <command>', 'Worker program (default: python)')
  .option('--worker-arg <arg>', 'Worker argument, repeatable (default: ./bot_main.py)', collect)
  .option('--verbose', 'Enable verbose and performance logging');

function resolveConfig(): SupervisorConfig {
  const globalOpts = program.opts<GlobalOptions>();
  if (globalOpts.verbose) {
    setVerbose(true);
  }
  return loadSupervisorConfig(process.env, toOverrides(globalOpts));
}

async function runCommand(action: (config: SupervisorConfig) => Promise<number>): Promise<void> {
  try {
    process.exitCode = await action(resolveConfig());
  } catch (error) {
    console.error('Supervisor failed:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

// Command: start
program
  .command('start', { isDefault: true })
  .description('Run the supervisor loop until SIGINT or SIGTERM')
  .action(async () => {
    await runCommand(config => start(config));
  });

// Command: status
program
  .command('status')
  .description('Show whether the working tree is clean and list pending changes')
  .action(async () => {
    await runCommand(config => status(config));
  });

// Command: sync
program
  .command('sync')
  .description('Run a single fetch and hard reset (skipped when the tree is dirty)')
  .action(async () => {
    await runCommand(config => sync(config));
  });

export { program, start, status, sync };
