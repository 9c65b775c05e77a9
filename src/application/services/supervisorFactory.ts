// Supervisor wiring: build the loop dependencies from configuration

import { SupervisorConfig } from '../../domain/types/types';
import { LoggerPort } from '../../domain/ports/logger';
import { CommandExecutorPort } from '../../domain/ports/commandExecutor';
import { WorkingTreePort } from '../../domain/ports/workingTree';
import { WorkerProcessPort } from '../../domain/ports/workerProcess';
import { SourceSynchronizer, SupervisorLoopDeps } from './supervisorLoop';
import { LoggerAdapter } from '../../infrastructure/adapters/logging/loggerAdapter';
import { CommandExecutorAdapter } from '../../infrastructure/adapters/os/commandExecutorAdapter';
import { GitWorkingTreeAdapter } from '../../infrastructure/adapters/vcs/gitWorkingTreeAdapter';
import { WorkerProcessAdapter } from '../../infrastructure/adapters/os/workerProcessAdapter';

export interface Supervisor extends SupervisorLoopDeps {
  synchronizer: SourceSynchronizer;
  workingTree: WorkingTreePort;
}

export interface SupervisorOverrides {
  logger?: LoggerPort;
  executor?: CommandExecutorPort;
  worker?: WorkerProcessPort;
}

export function createSupervisor(config: SupervisorConfig, overrides: SupervisorOverrides = {}): Supervisor {
  const logger = overrides.logger ?? new LoggerAdapter();
  const executor = overrides.executor ?? new CommandExecutorAdapter();
  const worker = overrides.worker ?? new WorkerProcessAdapter(config.workerCommand, config.workerArgs, config.cwd);

  const workingTree = new GitWorkingTreeAdapter(executor, config.cwd);
  const synchronizer = new SourceSynchronizer(
    workingTree,
    { remote: config.remote, branch: config.branch, resetRef: config.resetRef },
    logger
  );

  return { synchronizer, workingTree, worker, logger };
}
