/**
 * Parse helpers for data crossing into the process (child stdout, CLI
 * arguments). Validation happens once, here, and yields typed values.
 */

import { Result, ok, err } from 'neverthrow';
import type { z } from 'zod';
import type { ParseFailedError, ValidationFailedError } from './app-error.js';
import { Err } from './factories.js';

function describeIssues(error: z.ZodError, separator: string): string {
  return error.errors
    .map(e => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    .join(separator);
}

/**
 * Parse JSON printed by a child process (process → memory boundary).
 */
export function parseJsonOutput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  text: string,
  source: string
): Result<T, ParseFailedError> {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    const details = e instanceof Error ? e.message : String(e);
    return err(Err.parseFailed(source, details));
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    return err(Err.parseFailed(source, describeIssues(result.error, '; ')));
  }
  return ok(result.data);
}

/**
 * Validate CLI option values (argv → memory boundary).
 */
export function validateCliOptions<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: unknown
): Result<T, ValidationFailedError> {
  const result = schema.safeParse(options);
  if (!result.success) {
    return err(Err.validationFailed('options', JSON.stringify(options), describeIssues(result.error, '; ')));
  }
  return ok(result.data);
}
