import { WorkerProcessPort } from '@/domain/ports/workerProcess';
import { WorkerExit } from '@/domain/types/types';
import { workerExit } from '@helpers/result-builders';

type RunHook = (runNumber: number) => void | Promise<void>;

export class WorkerProcessMock implements WorkerProcessPort {
  private exits: WorkerExit[] = [];
  private hook: RunHook | null = null;
  private active = 0;

  public runCount = 0;
  public maxConcurrent = 0;
  public terminateCalls: NodeJS.Signals[] = [];

  constructor(private timeline: string[] = []) {}

  async run(): Promise<WorkerExit> {
    this.runCount++;
    const runNumber = this.runCount;
    this.active++;
    this.maxConcurrent = Math.max(this.maxConcurrent, this.active);
    this.timeline.push(`worker:start:${runNumber}`);

    try {
      if (this.hook) {
        await this.hook(runNumber);
      }
      return this.exits.shift() ?? workerExit();
    } finally {
      this.timeline.push(`worker:exit:${runNumber}`);
      this.active--;
    }
  }

  terminate(signal: NodeJS.Signals): boolean {
    this.terminateCalls.push(signal);
    return this.active > 0;
  }

  // --- Mock Configuration ---
  queueExit(exit: Partial<WorkerExit>): this {
    this.exits.push(workerExit(exit));
    return this;
  }

  /** Runs while the worker is "alive"; the run resolves after it settles */
  onRun(hook: RunHook): this {
    this.hook = hook;
    return this;
  }
}
