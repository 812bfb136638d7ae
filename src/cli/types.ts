import type { Logger } from '../utils/logger.js';

/**
 * Options parsed on the root program and shared by every command
 */
export interface GlobalOptions {
  /** Show debug lines */
  verbose: boolean;
  /** Print machine-readable JSON instead of text */
  json: boolean;
}

/**
 * Handed to each command action. It is also the Logger the engine and
 * the server write to, so `info` and `log` print the same way.
 */
export interface CommandContext extends Logger {
  options: GlobalOptions;
  /** Plain output, suppressed under --json */
  log: (message: string) => void;
  /** Only shown with --verbose */
  debug: (message: string) => void;
}
