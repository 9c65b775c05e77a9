// Git Working Tree Adapter
// WorkingTreePort over the git CLI, run through the command executor port

import { WorkingTreePort } from '../../../domain/ports/workingTree';
import { CommandExecutorPort } from '../../../domain/ports/commandExecutor';
import { CommandResult, WorkingTreeStatus } from '../../../domain/types/types';
import { isWorkingTreeClean, parsePorcelainStatus } from '../../../domain/vcs/porcelainStatus';

const GIT = 'git';

export class GitWorkingTreeAdapter implements WorkingTreePort {
  constructor(
    private executor: CommandExecutorPort,
    private cwd: string
  ) {}

  /**
   * Cleanliness is decided from stdout alone: a failing `git status`
   * that prints nothing reads as clean, and the following fetch fails instead.
   */
  async getStatus(): Promise<WorkingTreeStatus> {
    const result = await this.executor.execute(GIT, ['status', '--porcelain'], this.cwd);
    return {
      clean: isWorkingTreeClean(result.stdout),
      entries: parsePorcelainStatus(result.stdout),
      result,
    };
  }

  async fetch(remote: string, branch: string): Promise<CommandResult> {
    return this.executor.execute(GIT, ['fetch', remote, branch], this.cwd);
  }

  async resetHard(ref: string): Promise<CommandResult> {
    return this.executor.execute(GIT, ['reset', '--hard', ref], this.cwd);
  }
}
