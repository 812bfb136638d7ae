/**
 * Logger Interface for Library Code
 *
 * Library code (the RAG engine, collaborators, the HTTP server) accepts a
 * Logger by injection. The CLI passes its CommandContext, which satisfies
 * this interface; tests pass silentLogger or a vi.fn() based mock.
 */

export interface Logger {
  /** Log an informational message */
  info: (message: string) => void;
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log an error message */
  error: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Default console logger for use when no logger is injected.
 * Debug output is only written when RAGCHAT_DEBUG is set.
 */
export const consoleLogger: Logger = {
  info: (message: string) => console.log(message),
  warn: (message: string) => console.warn(message),
  error: (message: string) => console.error(message),
  debug: (message: string) => {
    if (process.env['RAGCHAT_DEBUG']) {
      console.log(`[debug] ${message}`);
    }
  },
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
