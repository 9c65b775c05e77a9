// Port: Worker Process
// Interface for starting the supervised program and waiting for it to exit

import { WorkerExit } from '../types/types';

export interface WorkerProcessPort {
  /**
   * Start the worker and resolve once it has exited. Never rejects:
   * spawn failures are reported through `WorkerExit.error`.
   */
  run(): Promise<WorkerExit>;

  /**
   * Forward a signal to the running worker.
   * Returns false when no worker is running.
   */
  terminate(signal: NodeJS.Signals): boolean;
}
