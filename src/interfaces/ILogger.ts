/**
 * Logger Interface
 *
 * Application code depends on this interface, never on pino directly,
 * so the backend can be swapped without touching services or middleware.
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
   * Example: "Executed SQL query", "Transaction committed"
   */
  debug(message: string): void;
  debug(metadata: LogMetadata, message: string): void;

  /**
   * Info level - Normal operations and business events
   * Example: "User created", "User deleted"
   */
  info(message: string): void;
  info(metadata: LogMetadata, message: string): void;

  /**
   * Warn level - Rejected input and recoverable conditions
   * Example: "Create user payload rejected", "Rate limit exceeded"
   */
  warn(message: string): void;
  warn(metadata: LogMetadata, message: string): void;

  /**
   * Error level - Failed operations requiring attention
   * Example: "Database query error", "Transaction rolled back"
   */
  error(message: string): void;
  error(metadata: LogMetadata, message: string): void;

  /**
   * Fatal level - Errors that stop the process
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
   * @param context - Optional context name (e.g., "UserProgram", "Database")
   */
  createLogger(context?: string): ILogger;
}
