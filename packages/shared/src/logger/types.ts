import type { ProfilerEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/** Ordered from most to least verbose */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Returns true when a message at `level` passes a logger configured at `threshold`.
 */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

/**
 * Interface for logging throughout buildprof.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ type: 'ScanStarted', ... });
 *
 * // Standard logging
 * logger.warn('Skipping vanished file: /work/out/a.o');
 * logger.error(new Error('Failed'), 'Scan failed');
 *
 * // Create a child logger with additional context
 * const scanLogger = logger.child({ phase: 'before' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured profiler event.
   * @param event - The event to log
   */
  log(event: ProfilerEvent): MaybePromise<void>;

  /**
   * High-signal trace event with a human-readable message.
   * @param event - The event being traced
   * @param message - Human-readable description
   */
  trace(event: ProfilerEvent, message: string): MaybePromise<void>;

  /** Log a debug message (lowest priority, disabled unless --verbose) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param error - The error that occurred
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   * @param bindings - Key-value pairs to include in all child logs
   */
  child(bindings: Record<string, unknown>): Logger;
}
