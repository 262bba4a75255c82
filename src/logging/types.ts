/**
 * Logging Types and Interfaces
 *
 * @module logging/types
 */

/**
 * All log levels, in severity order
 *
 * - silent: Suppress all logging (typically used in tests)
 * - fatal: Unrecoverable failure
 * - error: Error events
 * - warn: Potential issues (default for the CLI)
 * - info: Progress messages
 * - debug: Pipeline stages and external commands
 * - trace: Very detailed information, typically for development only
 */
export const LOG_LEVELS = ["silent", "fatal", "error", "warn", "info", "debug", "trace"] as const;

/**
 * Log levels supported by the logger
 */
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output
   * @default "warn"
   */
  level: LogLevel;

  /**
   * Log output format
   * - json: Structured JSON for log aggregation
   * - pretty: Human-readable colorized output
   * @default "pretty"
   */
  format: "json" | "pretty";

  /**
   * Optional custom output stream for testing
   * When provided, logs will be written to this stream instead of stderr
   * @internal - Only used in tests for log capture
   */
  stream?: NodeJS.WritableStream;
}

/**
 * Component context for child loggers
 */
export interface ComponentContext {
  /**
   * Component name (e.g., "extraction:pipeline", "extraction:shell", "cli")
   *
   * Use colon notation for hierarchical components.
   */
  component: string;

  /**
   * Optional correlation ID, e.g. the file being processed
   */
  requestId?: string;
}
