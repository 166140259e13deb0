import type { PipelineEvent } from '../types/events';

/**
 * Interface for logging throughout testbuilder.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ ...eventBase('mutex'), type: 'TrailsCounted', payload: { count: 3 } });
 *
 * // Log with trace context
 * logger.trace(event, 'Generating spin and test files for mutex');
 *
 * // Create a child logger with additional context
 * const childLogger = logger.child({ model: 'mutex' });
 * ```
 */
export interface Logger {
  /**
   * Record a structured pipeline event.
   */
  log(event: PipelineEvent): void;

  /**
   * High-signal trace event with a human-readable message.
   */
  trace(event: PipelineEvent, message: string): void;

  /** Log a debug message (only shown in verbose mode) */
  debug(message: string): void;
  /** Log an informational message */
  info(message: string): void;
  /** Log a warning message */
  warn(message: string): void;
  /**
   * Log an error with optional message.
   */
  error(error: Error, message?: string): void;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
