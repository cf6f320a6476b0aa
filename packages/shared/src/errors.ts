/**
 * Error codes used throughout envforge.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'GenerationError'
  | 'SandboxBuildError'
  | 'SandboxTimeoutError'
  | 'SandboxRuntimeError'
  | 'InfrastructureError'
  | 'ProcessError'
  | 'ResultStoreError'
  | 'MemoryError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all envforge errors.
 *
 * @example
 * ```typescript
 * throw new AppError('ProcessError', 'docker build exited abnormally', {
 *   cause: originalError,
 *   details: { image: 'envforge-acme-widgets:0a1b2c3d4e5f' },
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Configuration is invalid or missing.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Incorrect CLI usage or unreadable input files.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * A generator backend could not produce an artifact.
 */
export class GenerationError extends AppError {
  /** Stage that failed */
  public readonly stage?: string;

  constructor(message: string, options: AppErrorOptions & { stage?: string } = {}) {
    super('GenerationError', message, options);
    this.stage = options.stage;
  }
}

export class SandboxBuildError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('SandboxBuildError', message, options);
  }
}

export class SandboxTimeoutError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('SandboxTimeoutError', message, options);
  }
}

export class SandboxRuntimeError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('SandboxRuntimeError', message, options);
  }
}

/**
 * The sandbox backend itself is unavailable (daemon down, binary missing).
 * Not an instance-level failure: the batch stops.
 */
export class InfrastructureError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('InfrastructureError', message, options);
  }
}

/**
 * Error thrown when a subprocess fails to start or exits abnormally.
 */
export class ProcessError extends AppError {
  /** Exit code of the failed process */
  public readonly exitCode?: number;

  constructor(message: string, options: AppErrorOptions & { exitCode?: number } = {}) {
    super('ProcessError', message, options);
    this.exitCode = options.exitCode;
  }
}

export class ResultStoreError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ResultStoreError', message, options);
  }
}

/**
 * Error thrown when Memory Pool operations fail.
 */
export class MemoryError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('MemoryError', message, options);
  }
}

/**
 * Maps an error to a process exit code: 2 for user-correctable errors, 1 otherwise.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof AppError && (error.code === 'ConfigError' || error.code === 'UsageError')) {
    return 2;
  }
  return 1;
}
