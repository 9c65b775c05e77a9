// Port: Working Tree
// Interface for the version-control operations the supervisor consumes

import { CommandResult, WorkingTreeStatus } from '../types/types';

export interface WorkingTreePort {
  /**
   * Report working-tree cleanliness (staged, unstaged and untracked changes all count)
   */
  getStatus(): Promise<WorkingTreeStatus>;

  fetch(remote: string, branch: string): Promise<CommandResult>;

  /**
   * Discard local commits and changes so the tree matches `ref` exactly
   */
  resetHard(ref: string): Promise<CommandResult>;
}
