import type { EvaluatorEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLevelEnabled(minimum: LogLevel, level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimum];
}

/**
 * Interface for logging throughout the evaluator.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ type: 'JobAcquired', ... });
 *
 * // Standard logging
 * logger.info('Evaluating job 42');
 * logger.error(new Error('Failed'), 'Could not report job');
 *
 * // Create a child logger with additional context
 * const jobLogger = logger.child({ jobId: '42' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured evaluator event.
   * @param event - The event to log
   */
  log(event: EvaluatorEvent): MaybePromise<void>;

  /**
   * High-signal trace event with a human-readable message.
   * @param event - The event being traced
   * @param message - Human-readable description
   */
  trace(event: EvaluatorEvent, message: string): MaybePromise<void>;

  /** Log a debug message (shown only in verbose mode) */
  debug(message: string): void;
  /** Log an informational message */
  info(message: string): void;
  /** Log a warning message */
  warn(message: string): void;
  /**
   * Log an error with optional message.
   * @param error - The error that occurred
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): void;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
