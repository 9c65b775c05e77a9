import { CommandExecutorPort } from '../../../domain/ports/commandExecutor';
import { executeCommand } from '../../connectors/os/executors/commandExecutor';
import { CommandResult } from '../../../domain/types/types';

export class CommandExecutorAdapter implements CommandExecutorPort {
  async execute(file: string, args: string[], cwd: string): Promise<CommandResult> {
    return executeCommand(file, args, cwd);
  }
}
