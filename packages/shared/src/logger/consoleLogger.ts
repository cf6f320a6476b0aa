import type { PipelineEvent } from '../types/events';
import type { Logger } from './types';
import { formatPrefix } from './prefix';

export interface ConsoleLoggerOptions {
  /** Print debug messages; off unless --verbose */
  verbose?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  log(event: PipelineEvent): void {
    if (this.verbose) {
      console.log(JSON.stringify(event));
    }
  }

  trace(event: PipelineEvent, message: string): void {
    if (this.verbose) {
      console.log(message, JSON.stringify(event));
    } else {
      console.log(message);
    }
  }

  debug(message: string): void {
    if (this.verbose) {
      console.debug(message);
    }
  }

  info(message: string): void {
    console.info(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }
}

export class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: PipelineEvent) {
    return this.base.log(event);
  }

  trace(event: PipelineEvent, message: string) {
    return this.base.trace(event, formatPrefix(this.bindings, message));
  }

  debug(message: string) {
    return this.base.debug(formatPrefix(this.bindings, message));
  }

  info(message: string) {
    return this.base.info(formatPrefix(this.bindings, message));
  }

  warn(message: string) {
    return this.base.warn(formatPrefix(this.bindings, message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? formatPrefix(this.bindings, message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }
}
