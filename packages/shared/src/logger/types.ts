import type { CopyheadEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout copyhead.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ ...eventMeta(runId), type: 'RunStarted', payload });
 *
 * // Standard logging
 * logger.info('Added header to src/main.rs');
 * logger.error(new Error('Failed'), 'Run aborted');
 *
 * // Create a child logger with additional context
 * const fileLogger = logger.child({ file: 'src/main.rs' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured event.
   */
  log(event: CopyheadEvent): MaybePromise<void>;

  /** Log a debug message (only shown in verbose mode) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
