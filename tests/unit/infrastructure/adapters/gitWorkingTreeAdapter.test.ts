import { GitWorkingTreeAdapter } from '@/infrastructure/adapters/vcs/gitWorkingTreeAdapter';
import { CommandExecutorMock } from '@mocks/infrastructure/executor/command-executor.mock';

describe('GitWorkingTreeAdapter', () => {
  let executor: CommandExecutorMock;
  let adapter: GitWorkingTreeAdapter;

  beforeEach(() => {
    executor = new CommandExecutorMock();
    adapter = new GitWorkingTreeAdapter(executor, '/srv/bot');
  });

  describe('getStatus', () => {
    it('should report a clean tree when porcelain output is empty', async () => {
      const status = await adapter.getStatus();

      expect(status.clean).toBe(true);
      expect(status.entries).toEqual([]);
      expect(executor.getCallHistory()).toEqual([
        { file: 'git', args: ['status', '--porcelain'], cwd: '/srv/bot' },
      ]);
    });

    it('should report staged, unstaged and untracked entries as dirty', async () => {
      executor.setCommandResponse('git status', { stdout: 'M  config.json\n M bot_main.py\n?? scratch.txt' });

      const status = await adapter.getStatus();

      expect(status.clean).toBe(false);
      expect(status.entries.map(entry => [entry.path, entry.kind])).toEqual([
        ['config.json', 'staged'],
        ['bot_main.py', 'unstaged'],
        ['scratch.txt', 'untracked'],
      ]);
    });

    it('should treat a failing status command with no output as clean', async () => {
      executor.setCommandResponse('git status', {
        exitCode: 128,
        stderr: 'fatal: not a git repository (or any of the parent directories): .git',
      });

      const status = await adapter.getStatus();

      expect(status.clean).toBe(true);
      expect(status.result.passed).toBe(false);
      expect(status.result.exitCode).toBe(128);
    });
  });

  it('should fetch the given remote and branch', async () => {
    const result = await adapter.fetch('origin', 'main');

    expect(result.command).toBe('git fetch origin main');
    expect(executor.getCallHistory()).toEqual([
      { file: 'git', args: ['fetch', 'origin', 'main'], cwd: '/srv/bot' },
    ]);
  });

  it('should hard-reset to the given ref', async () => {
    executor.setCommandResponse('git reset', { exitCode: 1, stderr: 'fatal: ambiguous argument' });

    const result = await adapter.resetHard('FETCH_HEAD');

    expect(result.passed).toBe(false);
    expect(executor.getCommands()).toEqual(['git reset --hard FETCH_HEAD']);
  });
});
