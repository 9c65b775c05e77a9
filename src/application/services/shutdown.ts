// Shutdown handling: SIGINT/SIGTERM stop the loop after the current worker exits

import { constants } from 'os';
import { WorkerProcessPort } from '../../domain/ports/workerProcess';
import { LoggerPort } from '../../domain/ports/logger';

export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

export const SHUTDOWN_SIGNALS: readonly ShutdownSignal[] = ['SIGINT', 'SIGTERM'];

export interface SignalSource {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  removeListener(event: NodeJS.Signals, listener: () => void): unknown;
}

export interface ShutdownHandle {
  signal: AbortSignal;
  /** Signal that triggered the shutdown, if any */
  received(): ShutdownSignal | null;
  /** 128 + signal number once a signal was received, otherwise 0 */
  exitCode(): number;
  dispose(): void;
}

export function signalExitCode(signal: ShutdownSignal): number {
  return 128 + constants.signals[signal];
}

export function installShutdownHandlers(
  worker: WorkerProcessPort,
  logger: LoggerPort,
  source: SignalSource = process
): ShutdownHandle {
  const controller = new AbortController();
  let received: ShutdownSignal | null = null;

  const listeners = SHUTDOWN_SIGNALS.map(name => {
    const listener = (): void => {
      if (received === null) {
        received = name;
        logger.log('Shutdown', `Received ${name}, stopping after the current worker exits`);
        controller.abort();
      }
      const forwarded = worker.terminate(name);
      logger.logVerbose('Shutdown', 'Signal forwarded to worker', { signal: name, forwarded });
    };
    source.on(name, listener);
    return { name, listener };
  });

  return {
    signal: controller.signal,
    received: () => received,
    exitCode: () => (received === null ? 0 : signalExitCode(received)),
    dispose: () => {
      for (const { name, listener } of listeners) {
        source.removeListener(name, listener);
      }
    },
  };
}
