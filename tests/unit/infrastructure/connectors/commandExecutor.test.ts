// Command executor unit tests (execFile is mocked; nothing is spawned)

const mockExecFileAsync = jest.fn();

jest.mock('child_process', () => {
  const { promisify } = jest.requireActual('util');
  const execFile = jest.fn();
  Object.defineProperty(execFile, promisify.custom, {
    value: (...args: unknown[]) => mockExecFileAsync(...args),
  });
  return { ...jest.requireActual('child_process'), execFile };
});

import { executeCommand, formatCommand } from '@/infrastructure/connectors/os/executors/commandExecutor';

describe('CommandExecutor', () => {
  beforeEach(() => {
    mockExecFileAsync.mockReset();
    jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should format a command line for reporting', () => {
    expect(formatCommand('git', ['reset', '--hard', 'FETCH_HEAD'])).toBe('git reset --hard FETCH_HEAD');
  });

  it('should return a passing result and keep leading status columns', async () => {
    mockExecFileAsync.mockResolvedValue({ stdout: ' M bot_main.py\n', stderr: '' });

    const result = await executeCommand('git', ['status', '--porcelain'], '/srv/bot');

    expect(result).toEqual({
      command: 'git status --porcelain',
      exitCode: 0,
      stdout: ' M bot_main.py',
      stderr: '',
      passed: true,
    });
    expect(mockExecFileAsync).toHaveBeenCalledWith('git', ['status', '--porcelain'], {
      cwd: '/srv/bot',
      maxBuffer: 10 * 1024 * 1024,
      encoding: 'utf8',
    });
  });

  it('should resolve with the exit code when the command fails', async () => {
    mockExecFileAsync.mockRejectedValue(
      Object.assign(new Error('Command failed: git fetch origin main'), {
        code: 128,
        stdout: '',
        stderr: "fatal: couldn't find remote ref main\n",
      })
    );

    const result = await executeCommand('git', ['fetch', 'origin', 'main'], '/srv/bot');

    expect(result).toEqual({
      command: 'git fetch origin main',
      exitCode: 128,
      stdout: '',
      stderr: "fatal: couldn't find remote ref main",
      passed: false,
    });
  });

  it('should fall back to exit code 1 and the error message when git is missing', async () => {
    mockExecFileAsync.mockRejectedValue(Object.assign(new Error('spawn git ENOENT'), { code: 'ENOENT' }));

    const result = await executeCommand('git', ['status', '--porcelain'], '/srv/bot');

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe('spawn git ENOENT');
    expect(result.passed).toBe(false);
  });
});
