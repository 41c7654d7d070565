/**
 * Logging utilities for consistent formatted output with log level support.
 *
 * All log output goes to stderr so that stdout stays reserved for the
 * message stream. By default only 'info' level logs are shown. Set
 * INGEST_DEBUG=1 or pass --debug to enable verbose 'debug' level logs.
 */

// ============================================================================
// Global Debug State
// ============================================================================

const DEBUG_ENV_VAR = 'INGEST_DEBUG';

let debugEnabled = false;

/**
 * Enable debug logging globally.
 *
 * Called during CLI initialization when the --debug flag is detected.
 */
export function enableDebugLogging(): void {
  debugEnabled = true;
}

/**
 * Check if debug logging is currently enabled.
 */
export function isDebugEnabled(): boolean {
  return debugEnabled || process.env[DEBUG_ENV_VAR] === '1';
}

// ============================================================================
// Log Levels
// ============================================================================

/**
 * Log level determines visibility of log messages.
 *
 * - 'info': Always shown (warnings, state changes the user should see)
 * - 'debug': Only shown in debug mode (per-record diagnostics, timer traces)
 */
type LogLevel = 'info' | 'debug';

/**
 * Log contexts for different components.
 * Used to prefix log messages with component name.
 */
export type LogContext =
  | 'ingest'
  | 'pipeline'
  | 'queue'
  | 'transport'
  | 'sse'
  | 'socket'
  | 'supervisor'
  | 'metrics'
  | 'bench';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Logger instance with support for different log levels.
 */
export interface Logger {
  /**
   * Log an info message (always shown).
   */
  info: (message: string) => void;

  /**
   * Log a debug message (only shown in debug mode).
   */
  debug: (message: string) => void;

  /**
   * Log a message at debug level.
   */
  (message: string): void;
}

// ============================================================================
// Logger Implementation
// ============================================================================

/**
 * Create a logger instance for a specific context.
 *
 * @example
 * ```typescript
 * const log = createLogger('socket');
 *
 * // Always shown
 * log.info('Keepalive failed after 3 missed pongs');
 *
 * // Only shown with --debug or INGEST_DEBUG=1
 * log.debug('Ping sent');
 * ```
 */
export function createLogger(context: LogContext): Logger {
  const logMessage = (message: string, level: LogLevel = 'debug'): void => {
    if (level === 'debug' && !isDebugEnabled()) {
      return;
    }
    console.error(`[${context}] ${message}`);
  };

  const logger: Logger = Object.assign((message: string) => logMessage(message, 'debug'), {
    info: (message: string) => logMessage(message, 'info'),
    debug: (message: string) => logMessage(message, 'debug'),
  });

  return logger;
}
