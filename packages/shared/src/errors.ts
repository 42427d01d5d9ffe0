/**
 * Error codes used throughout buildprof.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'ScanError'
  | 'DiffError'
  | 'SnapshotError'
  | 'BuildError'
  | 'ReportError'
  | 'InterruptedError'
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
 * Base error class for all buildprof errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ScanError', 'Cannot list directory', {
 *   cause: originalError,
 *   details: { path: '/work/build' }
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
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 * User-correctable - suggests correct usage.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when the root of a scan cannot be opened or listed.
 * Aborts the enclosing scan; no partial snapshot is produced.
 */
export class RootUnreadableError extends AppError {
  /** The directory that could not be listed */
  public readonly path: string;

  constructor(path: string, options: AppErrorOptions = {}) {
    super('ScanError', `Cannot read directory: ${path}`, {
      ...options,
      details: options.details ?? { path },
    });
    this.path = path;
  }
}

/**
 * Error thrown when a scan is cancelled before it completes.
 */
export class ScanAbortedError extends AppError {
  constructor(root: string, options: AppErrorOptions = {}) {
    super('ScanError', `Scan of ${root} was aborted`, options);
  }
}

/**
 * Error thrown when a snapshot handed to the differ is malformed.
 */
export class DiffInputInvalidError extends AppError {
  /** Path of the offending record */
  public readonly path: string;
  public readonly reason: string;

  constructor(path: string, reason: string, options: AppErrorOptions = {}) {
    super('DiffError', `Invalid snapshot record "${path}": ${reason}`, {
      ...options,
      details: options.details ?? { path, reason },
    });
    this.path = path;
    this.reason = reason;
  }
}

/**
 * Error thrown when a persisted snapshot cannot be read back.
 */
export class SnapshotFormatError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('SnapshotError', message, options);
  }
}

/**
 * Error thrown when the build command cannot be started.
 * A build that starts and exits non-zero is not an error.
 */
export class BuildError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('BuildError', message, options);
  }
}

/**
 * Error thrown when a report cannot be written.
 */
export class ReportError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ReportError', message, options);
  }
}

/**
 * Error thrown when the user interrupts a run, e.g. with Ctrl-C at a prompt.
 */
export class InterruptedError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('InterruptedError', message, options);
  }
}

/**
 * Maps an error to the process exit code the CLI should use.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof UsageError) {
    return 2;
  }
  return 1;
}
