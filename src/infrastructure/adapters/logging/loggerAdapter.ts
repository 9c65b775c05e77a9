import { LoggerPort } from '../../../domain/ports/logger';
import { isVerbose, log, logStateTransition, logError, writePerformance, writeVerbose } from './logger';

export interface LoggerAdapterOptions {
  /** Overrides the process-wide verbose flag for this logger */
  verbose?: boolean;
}

export class LoggerAdapter implements LoggerPort {
  constructor(private readonly options: LoggerAdapterOptions = {}) {}

  private verboseEnabled(): boolean {
    return this.options.verbose ?? isVerbose();
  }

  log(module: string, message: string, ...args: unknown[]): void {
    log(module, message, ...args);
  }

  logVerbose(component: string, message: string, data?: Record<string, unknown>): void {
    if (this.verboseEnabled()) writeVerbose(component, message, data);
  }

  logPerformance(operation: string, duration: number, metadata?: Record<string, unknown>): void {
    if (this.verboseEnabled()) writePerformance(operation, duration, metadata);
  }

  logStateTransition(from: string, to: string, context?: Record<string, unknown>): void {
    logStateTransition(from, to, context);
  }

  logError(module: string, message: string, error?: unknown): void {
    logError(module, message, error);
  }
}
