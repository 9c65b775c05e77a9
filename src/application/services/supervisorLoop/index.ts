// Supervisor Loop
// Resync the working tree when it is clean, run the worker to completion, repeat.
// Only an external abort stops it; every failure just ends the current iteration.

import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { WorkerProcessPort } from '../../../domain/ports/workerProcess';
import { LoggerPort } from '../../../domain/ports/logger';
import { IterationReport, SyncOutcome, WorkerExit } from '../../../domain/types/types';

export { SourceSynchronizer } from './modules/sourceSynchronizer';
export type { SyncTarget } from './modules/sourceSynchronizer';

export interface SyncStep {
  synchronize(iteration: number): Promise<SyncOutcome>;
}

export interface SupervisorLoopDeps {
  synchronizer: SyncStep;
  worker: WorkerProcessPort;
  logger: LoggerPort;
}

export interface SupervisorLoopOptions {
  /**
   * Checked before each iteration and again before the worker starts.
   * A worker already running always completes first.
   */
  signal?: AbortSignal;
  onIteration?: (report: IterationReport) => void;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function describeWorkerExit(exit: WorkerExit): string {
  if (exit.error) return `failed to start: ${exit.error}`;
  if (exit.signal) return `terminated by ${exit.signal}`;
  return `exited with code ${exit.code}`;
}

/**
 * One iteration: sync, then run the worker. When `signal` is aborted by the
 * time the sync finishes the worker is not started and `worker` is null.
 */
export async function runIteration(
  deps: SupervisorLoopDeps,
  iteration: number,
  signal?: AbortSignal
): Promise<IterationReport> {
  const { synchronizer, worker, logger } = deps;

  let sync: SyncOutcome;
  try {
    sync = await synchronizer.synchronize(iteration);
  } catch (error) {
    logger.logError('SupervisorLoop', `[Iteration ${iteration}] Source sync threw`, error);
    sync = { action: 'errored', error: errorMessage(error) };
  }

  if (signal?.aborted) {
    logger.log('SupervisorLoop', `[Iteration ${iteration}] Shutdown requested, not starting the worker`);
    return { iteration, sync, worker: null };
  }

  logger.logStateTransition('SYNC', 'WORKER', { iteration, sync: sync.action });

  const workerStartTime = Date.now();
  let exit: WorkerExit;
  try {
    exit = await worker.run();
  } catch (error) {
    logger.logError('SupervisorLoop', `[Iteration ${iteration}] Worker run threw`, error);
    exit = { code: null, signal: null, error: errorMessage(error), durationMs: Date.now() - workerStartTime };
  }

  // Exit status is reported, never acted on
  logger.log('SupervisorLoop', `[Iteration ${iteration}] Worker ${describeWorkerExit(exit)} after ${exit.durationMs}ms`);

  return { iteration, sync, worker: exit };
}

/**
 * Runs until `options.signal` is aborted. Resolves with the number of
 * iterations started, including one cut short before its worker ran.
 */
export async function supervisorLoop(
  deps: SupervisorLoopDeps,
  options: SupervisorLoopOptions = {}
): Promise<number> {
  const { logger } = deps;
  let iteration = 0;
  logger.log('SupervisorLoop', 'Supervisor loop started');

  while (!options.signal?.aborted) {
    iteration++;
    const iterationStartTime = Date.now();
    logger.logVerbose('SupervisorLoop', `Starting iteration ${iteration}`);

    const report = await runIteration(deps, iteration, options.signal);

    if (options.onIteration) {
      try {
        options.onIteration(report);
      } catch (error) {
        logger.logError('SupervisorLoop', `[Iteration ${iteration}] Iteration listener threw`, error);
      }
    }

    logger.logPerformance('Iteration', Date.now() - iterationStartTime, { iteration });

    // No delay; only lets signal handlers and timers run between iterations
    await yieldToEventLoop();
  }

  logger.log('SupervisorLoop', `Supervisor loop stopped after ${iteration} iteration(s)`);
  return iteration;
}
