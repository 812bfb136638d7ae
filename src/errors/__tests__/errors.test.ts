/**
 * Tests for the error taxonomy and its CLI formatting
 */

import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigurationError,
  ValidationError,
  RetrievalError,
  GenerationError,
  TelemetryError,
  errorMessage,
  formatError,
  getExitCode,
} from '../index.js';

describe('Error Classes', () => {
  describe('AppError', () => {
    it('creates error with message only', () => {
      const error = new AppError('Something went wrong');

      expect(error.message).toBe('Something went wrong');
      expect(error.hint).toBeUndefined();
      expect(error.code).toBe(1);
      expect(error.statusCode).toBe(500);
      expect(error.name).toBe('AppError');
    });

    it('creates error with custom exit and status codes', () => {
      const error = new AppError('Critical failure', 'Reboot', 99, 503);

      expect(error.hint).toBe('Reboot');
      expect(error.code).toBe(99);
      expect(error.statusCode).toBe(503);
    });

    it('is instanceof Error', () => {
      const error = new AppError('test');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(AppError);
    });
  });

  describe('ConfigurationError', () => {
    it('uses the config list hint by default', () => {
      const error = new ConfigurationError('Missing endpoint');

      expect(error.hint).toBe('Run: ragchat config list  to see the active settings');
      expect(error.code).toBe(2);
      expect(error.name).toBe('ConfigurationError');
      expect(error).toBeInstanceOf(AppError);
    });

    it('accepts a custom hint', () => {
      expect(new ConfigurationError('Missing endpoint', 'Set it').hint).toBe('Set it');
    });
  });

  describe('ValidationError', () => {
    it('lists issues in the hint and maps to HTTP 400', () => {
      const error = new ValidationError('Invalid request', ['message: Required', 'topK: Too big']);

      expect(error.hint).toBe('Issues:\n  message: Required\n  topK: Too big');
      expect(error.issues).toEqual(['message: Required', 'topK: Too big']);
      expect(error.statusCode).toBe(400);
      expect(error.code).toBe(1);
    });

    it('falls back to a generic hint without issues', () => {
      const error = new ValidationError('Invalid input');

      expect(error.hint).toBe('Check your input and try again');
      expect(error.issues).toHaveLength(0);
    });
  });

  describe('RetrievalError', () => {
    it('keeps the original error as cause', () => {
      const cause = new Error('index not found');
      const error = new RetrievalError('index not found', cause);

      expect(error.cause).toBe(cause);
      expect(error.code).toBe(5);
      expect(error.statusCode).toBe(500);
    });

    it('wraps unknown failures with the same message', () => {
      const cause = new Error('503 Service Unavailable');
      const wrapped = RetrievalError.from(cause);

      expect(wrapped).toBeInstanceOf(RetrievalError);
      expect(wrapped.message).toBe('503 Service Unavailable');
      expect(wrapped.cause).toBe(cause);
    });

    it('passes AppErrors through unchanged', () => {
      const original = new ConfigurationError('no endpoint');

      expect(RetrievalError.from(original)).toBe(original);
    });

    it('wraps thrown strings', () => {
      const wrapped = RetrievalError.from('boom');

      expect(wrapped.message).toBe('boom');
      expect(wrapped.cause).toBe('boom');
    });
  });

  describe('GenerationError', () => {
    it('wraps collaborator failures', () => {
      const cause = new Error('content filter triggered');
      const wrapped = GenerationError.from(cause);

      expect(wrapped).toBeInstanceOf(GenerationError);
      expect(wrapped.message).toBe('content filter triggered');
      expect(wrapped.cause).toBe(cause);
      expect(wrapped.code).toBe(6);
    });

    it('passes AppErrors through unchanged', () => {
      const original = new ValidationError('bad');

      expect(GenerationError.from(original)).toBe(original);
    });
  });

  describe('TelemetryError', () => {
    it('records the cause', () => {
      const cause = new Error('exporter down');
      const error = new TelemetryError('Telemetry end failed', cause);

      expect(error.name).toBe('TelemetryError');
      expect(error.cause).toBe(cause);
    });
  });

  describe('errorMessage', () => {
    it('reads messages from errors and stringifies everything else', () => {
      expect(errorMessage(new Error('x'))).toBe('x');
      expect(errorMessage(42)).toBe('42');
    });
  });
});

describe('formatError', () => {
  describe('text output', () => {
    it('formats AppError with hint', () => {
      const output = formatError(new AppError('Failed', 'Try again'));

      expect(output).toContain('Failed');
      expect(output).toContain('Hint:');
      expect(output).toContain('Try again');
    });

    it('formats AppError without hint', () => {
      const output = formatError(new AppError('Failed'));

      expect(output).toContain('Failed');
      expect(output).not.toContain('Hint:');
    });

    it('shows the cause only in verbose mode', () => {
      const error = new GenerationError('stream broke', new Error('socket hang up'));

      expect(formatError(error)).not.toContain('socket hang up');
      expect(formatError(error, { verbose: true })).toContain('socket hang up');
    });

    it('formats standard Error with verbose hint', () => {
      const output = formatError(new Error('Something broke'));

      expect(output).toContain('Something broke');
      expect(output).toContain('--verbose');
    });

    it('shows stack trace in verbose mode', () => {
      const output = formatError(new AppError('Failed', 'Try again'), { verbose: true });

      expect(output).toContain('Stack trace:');
    });

    it('formats unknown error types', () => {
      expect(formatError('string error')).toContain('string error');
    });
  });

  describe('JSON output', () => {
    it('formats AppError as JSON', () => {
      const error = new ConfigurationError('Bad config', 'Fix it');
      const parsed = JSON.parse(formatError(error, { json: true }));

      expect(parsed).toEqual({
        error: 'Bad config',
        type: 'ConfigurationError',
        code: 2,
        hint: 'Fix it',
      });
    });

    it('includes cause and stack in JSON verbose mode', () => {
      const error = new RetrievalError('search failed', new Error('timeout'));
      const parsed = JSON.parse(formatError(error, { json: true, verbose: true }));

      expect(parsed.cause).toBe('timeout');
      expect(parsed.stack).toContain('search failed');
    });

    it('formats standard Error as JSON', () => {
      const parsed = JSON.parse(formatError(new Error('Oops'), { json: true }));

      expect(parsed.error).toBe('Oops');
      expect(parsed.code).toBe(1);
    });

    it('formats unknown error as JSON', () => {
      const parsed = JSON.parse(formatError(42, { json: true }));

      expect(parsed).toEqual({ error: '42', type: 'Unknown', code: 1 });
    });
  });
});

describe('getExitCode', () => {
  it('returns code from AppError subclasses', () => {
    expect(getExitCode(new AppError('test', undefined, 42))).toBe(42);
    expect(getExitCode(new ConfigurationError('bad'))).toBe(2);
    expect(getExitCode(new RetrievalError('down'))).toBe(5);
    expect(getExitCode(new GenerationError('down'))).toBe(6);
  });

  it('returns 1 for standard Error and unknown types', () => {
    expect(getExitCode(new Error('test'))).toBe(1);
    expect(getExitCode('string')).toBe(1);
    expect(getExitCode(undefined)).toBe(1);
  });
});
