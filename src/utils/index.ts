/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Injected logging for library code
export { consoleLogger, silentLogger, type Logger } from './logger.js';

// Shared lazy handles
export { Lazy } from './lazy.js';

// Package version
export { VERSION } from './version.js';
