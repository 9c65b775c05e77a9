import { WorkerProcessPort } from '../../../domain/ports/workerProcess';
import { WorkerExit } from '../../../domain/types/types';
import { startProcess, RunningProcess } from '../../connectors/os/executors/processRunner';

export class WorkerProcessAdapter implements WorkerProcessPort {
  private current: RunningProcess | null = null;

  constructor(
    private command: string,
    private args: string[],
    private cwd: string
  ) {}

  async run(): Promise<WorkerExit> {
    const running = startProcess(this.command, this.args, this.cwd);
    this.current = running;
    try {
      return await running.exited;
    } finally {
      this.current = null;
    }
  }

  terminate(signal: NodeJS.Signals): boolean {
    if (!this.current) {
      return false;
    }
    return this.current.child.kill(signal);
  }
}
