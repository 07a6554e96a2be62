import type { EvalEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout the harness.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ type: 'ScenarioStarted', ... });
 *
 * // Standard logging
 * logger.info('Scoring completed');
 * logger.error(new Error('Failed'), 'Could not write results');
 *
 * // Create a child logger with additional context
 * const checkLogger = logger.child({ check: 'code_runs' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured evaluation event.
   */
  log(event: EvalEvent): MaybePromise<void>;

  /** Log a debug message (lowest priority, hidden unless verbose) */
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
