/**
 * Logger Interface for Library Code
 *
 * Pipeline clients accept a Logger via dependency injection. The CLI layer
 * passes its CommandContext (which satisfies Logger), while tests pass
 * silentLogger or a vi.fn()-backed mock.
 *
 * Implementations must never receive credentials: callers log counts,
 * timings and status codes only.
 */

/**
 * Generic logger interface for library code
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Default console logger for use when no logger is injected.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.log(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
