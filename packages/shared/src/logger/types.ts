import type { PipelineEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout envforge.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * logger.log({ type: 'InstanceStarted', ... });
 * logger.trace(event, 'Routing retry to env');
 * logger.child({ instance: 'acme__widgets-42' }).info('build finished');
 * ```
 */
export interface Logger {
  /**
   * Persist a structured pipeline event.
   */
  log(event: PipelineEvent): MaybePromise<void>;

  /**
   * High-signal event with a human-readable summary.
   */
  trace(event: PipelineEvent, message: string): MaybePromise<void>;

  debug(message: string): MaybePromise<void>;
  info(message: string): MaybePromise<void>;
  warn(message: string): MaybePromise<void>;
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger whose messages are prefixed with `[key=value ...]`.
   */
  child(bindings: Record<string, unknown>): Logger;
}
