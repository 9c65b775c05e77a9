// Supervisor - Main Entry Point
// Exports all public APIs

// Supervisor Loop
export { supervisorLoop, runIteration, describeWorkerExit, SourceSynchronizer } from './src/application/services/supervisorLoop';
export type { SupervisorLoopDeps, SupervisorLoopOptions, SyncStep, SyncTarget } from './src/application/services/supervisorLoop';
export { createSupervisor } from './src/application/services/supervisorFactory';
export type { Supervisor, SupervisorOverrides } from './src/application/services/supervisorFactory';
export { installShutdownHandlers, signalExitCode } from './src/application/services/shutdown';
export type { ShutdownHandle, SignalSource } from './src/application/services/shutdown';

// Configuration
export { loadSupervisorConfig, validateSupervisorConfig, ConfigurationError } from './src/config/supervisorConfig';
export type { SupervisorConfigOverrides } from './src/config/supervisorConfig';

// Working tree
export { GitWorkingTreeAdapter } from './src/infrastructure/adapters/vcs/gitWorkingTreeAdapter';
export { parsePorcelainStatus, parsePorcelainLine, isWorkingTreeClean } from './src/domain/vcs/porcelainStatus';

// Worker process
export { WorkerProcessAdapter } from './src/infrastructure/adapters/os/workerProcessAdapter';

// Logging
export { LoggerAdapter } from './src/infrastructure/adapters/logging/loggerAdapter';
export type { LoggerAdapterOptions } from './src/infrastructure/adapters/logging/loggerAdapter';
export { setVerbose, isVerbose } from './src/infrastructure/adapters/logging/logger';

// Ports
export type { WorkingTreePort } from './src/domain/ports/workingTree';
export type { WorkerProcessPort } from './src/domain/ports/workerProcess';
export type { CommandExecutorPort } from './src/domain/ports/commandExecutor';
export type { LoggerPort } from './src/domain/ports/logger';

// Types
export type {
  CommandResult,
  StatusEntry,
  StatusEntryKind,
  WorkingTreeStatus,
  SyncOutcome,
  WorkerExit,
  IterationReport,
  SupervisorConfig,
} from './src/domain/types/types';
