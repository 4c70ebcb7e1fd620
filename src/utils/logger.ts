/**
 * Logger Interface for Library Code
 *
 * Evaluation code accepts a Logger via dependency injection rather than
 * writing to the console directly:
 * - Applications: pass their own logger (or consoleLogger)
 * - Tests: pass a mock or silentLogger
 *
 * Errors thrown by the library are never logged here; they reach the caller.
 */

/**
 * Generic logger interface
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not every logger needs debug) */
  debug?: (message: string) => void;
}

/**
 * Console-backed logger.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.debug(message),
};

/**
 * Silent logger, the default when nothing is injected.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
