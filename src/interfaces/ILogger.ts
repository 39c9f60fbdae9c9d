/**
 * Logger Interface
 *
 * Application code logs through this abstraction; the factory decides which
 * adapter backs it.
 */

/**
 * Structured data attached to a log entry
 */
export type LogMetadata = Record<string, unknown>;

export interface ILogger {
  /** Diagnostic detail: SQL timings, leg resolution */
  debug(message: string): void;
  debug(metadata: LogMetadata, message: string): void;

  /** Business events: transaction created, order executed */
  info(message: string): void;
  info(metadata: LogMetadata, message: string): void;

  /** Rejected requests and recoverable conditions */
  warn(message: string): void;
  warn(metadata: LogMetadata, message: string): void;

  /** Failed operations and rolled back units of work */
  error(message: string): void;
  error(metadata: LogMetadata, message: string): void;

  /** Unrecoverable failures before shutdown */
  fatal(message: string): void;
  fatal(metadata: LogMetadata, message: string): void;
}

/**
 * Logger Factory Interface
 */
export interface ILoggerFactory {
  /**
   * @param context - Component name attached to every entry (e.g. "TransactionService")
   */
  createLogger(context?: string): ILogger;
}
