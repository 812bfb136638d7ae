/**
 * Error type definitions for rag-chat
 *
 * Every error the pipeline raises on purpose derives from AppError, which
 * carries:
 * - a recovery hint shown to CLI users
 * - an exit code for the CLI
 * - an HTTP status code for the API server
 */

/**
 * Extract a message from anything that was thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Base class for all rag-chat errors.
 */
export class AppError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  /** HTTP status used when the error reaches the API server */
  public readonly statusCode: number;

  constructor(message: string, hint?: string, code: number = 1, statusCode: number = 500) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'AppError';
    this.hint = hint;
    this.code = code;
    this.statusCode = statusCode;
  }
}

/**
 * Thrown when settings are missing or invalid.
 *
 * Examples:
 * - Invalid TOML syntax or values in ragchat.toml
 * - The search or OpenAI endpoint is not configured
 *
 * Exit code 2: Configuration error
 */
export class ConfigurationError extends AppError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: ragchat config list  to see the active settings', 2);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when caller input fails validation (empty query, bad top-k,
 * malformed request body).
 *
 * Exit code 1, HTTP 400
 */
export class ValidationError extends AppError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1, 400);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown when the search collaborator fails. The message is the
 * collaborator's own; the original error is kept as `cause`.
 *
 * Exit code 5
 */
export class RetrievalError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'Check AZURE_AI_SEARCH_ENDPOINT, the index name and your Azure credentials', 5);
    this.name = 'RetrievalError';
    this.cause = cause;
  }

  /**
   * Wrap a collaborator failure. Errors that are already AppErrors
   * pass through untouched.
   */
  static from(error: unknown): AppError {
    if (error instanceof AppError) {
      return error;
    }
    return new RetrievalError(errorMessage(error), error);
  }
}

/**
 * Thrown when the chat-completion collaborator fails, either on the
 * initial request or while a stream is being consumed.
 *
 * Exit code 6
 */
export class GenerationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'Check AZURE_OPENAI_ENDPOINT, the deployment name and your Azure credentials', 6);
    this.name = 'GenerationError';
    this.cause = cause;
  }

  static from(error: unknown): AppError {
    if (error instanceof AppError) {
      return error;
    }
    return new GenerationError(errorMessage(error), error);
  }
}

/**
 * Raised inside the telemetry layer. Never reaches callers of the
 * pipeline: the safe tracer logs it and carries on.
 */
export class TelemetryError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'Check the [observability] settings and Langfuse keys', 1);
    this.name = 'TelemetryError';
    this.cause = cause;
  }
}
