/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js hands over option values as strings; these schemas coerce
 * and range-check them before a command runs.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

/** Upper bound for --top-k, same as the HTTP API */
export const MAX_TOP_K = 20;

export const TopKSchema = z.coerce
  .number({ invalid_type_error: 'top-k must be a number' })
  .int('top-k must be an integer')
  .min(1, 'top-k must be at least 1')
  .max(MAX_TOP_K, `top-k must be at most ${MAX_TOP_K}`);

export const PortSchema = z.coerce
  .number({ invalid_type_error: 'port must be a number' })
  .int('port must be an integer')
  .min(1, 'port must be between 1 and 65535')
  .max(65535, 'port must be between 1 and 65535');

export const QuestionSchema = z.string().trim().min(1, 'Question cannot be empty');

/**
 * Parse `input` or throw a ValidationError whose message names the option.
 */
export function parseOption<T>(schema: z.ZodType<T>, input: unknown, name: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => issue.message);
    throw new ValidationError(`Invalid ${name}: ${issues[0] ?? 'invalid value'}`, issues);
  }
  return result.data;
}
