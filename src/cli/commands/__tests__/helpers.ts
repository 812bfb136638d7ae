/**
 * Shared helpers for command tests.
 */

import { vi } from 'vitest';
import type { CommandContext, GlobalOptions } from '../../types.js';

export interface MockContext extends CommandContext {
  logs: string[];
  errors: string[];
  warnings: string[];
}

export function createMockContext(options: Partial<GlobalOptions> = {}): MockContext {
  const logs: string[] = [];
  const errors: string[] = [];
  const warnings: string[] = [];
  const log = vi.fn((message: string) => {
    logs.push(message);
  });
  return {
    options: { verbose: false, json: false, ...options },
    logs,
    errors,
    warnings,
    log,
    info: log,
    debug: vi.fn(),
    warn: vi.fn((message: string) => {
      warnings.push(message);
    }),
    error: vi.fn((message: string) => {
      errors.push(message);
    }),
  };
}
