import { WorkingTreePort } from '../../../../domain/ports/workingTree';
import { LoggerPort } from '../../../../domain/ports/logger';
import { SyncOutcome } from '../../../../domain/types/types';

export interface SyncTarget {
  remote: string;
  branch: string;
  resetRef: string;
}

/**
 * Steps 1-2 of an iteration: leave a dirty tree alone, otherwise
 * fetch the upstream branch and hard-reset to what was fetched.
 */
export class SourceSynchronizer {
  constructor(
    private workingTree: WorkingTreePort,
    private target: SyncTarget,
    private logger: LoggerPort
  ) {}

  async synchronize(iteration: number): Promise<SyncOutcome> {
    const startTime = Date.now();
    const status = await this.workingTree.getStatus();

    if (!status.clean) {
      this.logger.log(
        'SourceSynchronizer',
        `[Iteration ${iteration}] Working tree has ${status.entries.length} pending change(s), skipping sync`
      );
      this.logger.logVerbose('SourceSynchronizer', 'Pending changes', {
        iteration,
        paths: status.entries.map(entry => `${entry.index}${entry.workTree} ${entry.path}`),
      });
      return { action: 'skipped', reason: 'DIRTY_WORKING_TREE', entries: status.entries };
    }

    const { remote, branch, resetRef } = this.target;
    const fetch = await this.workingTree.fetch(remote, branch);
    if (!fetch.passed) {
      // Not escalated: the worker still runs on whatever is checked out
      this.logger.logError(
        'SourceSynchronizer',
        `[Iteration ${iteration}] Fetch of ${remote} ${branch} failed (exit code ${fetch.exitCode})`,
        fetch.stderr
      );
      return { action: 'fetch-failed', fetch };
    }

    const reset = await this.workingTree.resetHard(resetRef);
    if (reset.passed) {
      this.logger.log('SourceSynchronizer', `[Iteration ${iteration}] Reset to ${resetRef} (${remote} ${branch})`);
    } else {
      this.logger.logError(
        'SourceSynchronizer',
        `[Iteration ${iteration}] Reset to ${resetRef} failed (exit code ${reset.exitCode})`,
        reset.stderr
      );
    }
    this.logger.logPerformance('SourceSync', Date.now() - startTime, { iteration, reset_passed: reset.passed });

    return { action: 'reset', fetch, reset };
  }
}
