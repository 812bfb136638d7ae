/**
 * Error handling module for rag-chat
 *
 * Usage:
 *   import { ConfigurationError, handleError } from './errors/index.js';
 *
 *   throw new ConfigurationError('AZURE_OPENAI_ENDPOINT is not set');
 */

// Error types
export {
  AppError,
  ConfigurationError,
  ValidationError,
  RetrievalError,
  GenerationError,
  TelemetryError,
  errorMessage,
} from './types.js';

// Error handling utilities
export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
