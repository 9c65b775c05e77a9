import { EventEmitter } from 'events';
import { installShutdownHandlers, signalExitCode } from '@/application/services/shutdown';
import { WorkerProcessMock } from '@mocks/infrastructure/worker/worker-process.mock';
import { createLoggerMock } from '@mocks/adapters/logger.mock';

describe('Shutdown', () => {
  let source: EventEmitter;
  let worker: WorkerProcessMock;

  beforeEach(() => {
    source = new EventEmitter();
    worker = new WorkerProcessMock();
  });

  it('should map signals to conventional exit codes', () => {
    expect(signalExitCode('SIGINT')).toBe(130);
    expect(signalExitCode('SIGTERM')).toBe(143);
  });

  it('should stay idle until a signal arrives', () => {
    const handle = installShutdownHandlers(worker, createLoggerMock(), source);

    expect(handle.signal.aborted).toBe(false);
    expect(handle.received()).toBeNull();
    expect(handle.exitCode()).toBe(0);
  });

  it('should abort and forward the signal to the worker', () => {
    const logger = createLoggerMock();
    const handle = installShutdownHandlers(worker, logger, source);

    source.emit('SIGTERM');

    expect(handle.signal.aborted).toBe(true);
    expect(handle.received()).toBe('SIGTERM');
    expect(handle.exitCode()).toBe(143);
    expect(worker.terminateCalls).toEqual(['SIGTERM']);
    expect(logger.log).toHaveBeenCalledWith('Shutdown', 'Received SIGTERM, stopping after the current worker exits');
  });

  it('should keep the first signal for the exit code but forward later ones', () => {
    const handle = installShutdownHandlers(worker, createLoggerMock(), source);

    source.emit('SIGTERM');
    source.emit('SIGINT');

    expect(handle.exitCode()).toBe(143);
    expect(worker.terminateCalls).toEqual(['SIGTERM', 'SIGINT']);
  });

  it('should remove its listeners on dispose', () => {
    const handle = installShutdownHandlers(worker, createLoggerMock(), source);
    expect(source.listenerCount('SIGINT')).toBe(1);

    handle.dispose();

    expect(source.listenerCount('SIGINT')).toBe(0);
    expect(source.listenerCount('SIGTERM')).toBe(0);
  });
});
