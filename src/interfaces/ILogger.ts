/**
 * Logger Interface
 *
 * Abstraction for logging across the toolbox. Core services receive an
 * ILogger through their constructor instead of importing a process-wide
 * logger, so the caller decides where log lines go.
 *
 * Design Pattern: Adapter Pattern
 * - Application code depends on this interface (not concrete implementations)
 * - Adapters implement it on top of pino (console or JSON output)
 * - LoggerFactory selects the adapter based on LOGGER_TYPE
 */

/**
 * Log metadata - structured data attached to log entries
 */
export type LogMetadata = Record<string, unknown>;

/**
 * Logger interface following common logging patterns (pino, winston, etc.)
 */
export interface ILogger {
  /**
   * Debug level - Detailed diagnostic information
   * Example: "Planned fetch request", "Provider page received"
   */
  debug(message: string): void;
  debug(metadata: LogMetadata, message: string): void;

  /**
   * Info level - Normal operations
   * Example: "Batch written", "Download run completed"
   */
  info(message: string): void;
  info(metadata: LogMetadata, message: string): void;

  /**
   * Warn level - Conditions worth reviewing that do not stop the run
   * Example: "No data returned", "Retrying provider request"
   */
  warn(message: string): void;
  warn(metadata: LogMetadata, message: string): void;

  /**
   * Error level - Failed operations for a single instrument
   * Example: "Provider unavailable", "Write failed"
   */
  error(message: string): void;
  error(metadata: LogMetadata, message: string): void;

  /**
   * Fatal level - Errors that end the run
   * Example: "Unsupported security type", "Unexpected error"
   */
  fatal(message: string): void;
  fatal(metadata: LogMetadata, message: string): void;
}

/**
 * Logger Factory Interface
 */
export interface ILoggerFactory {
  /**
   * Create a logger instance
   * @param context - Optional context name (e.g., "BatchDownloadService", "PolygonGateway")
   */
  createLogger(context?: string): ILogger;
}
