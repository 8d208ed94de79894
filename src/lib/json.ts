/**
 * JSON helpers for user-supplied tool arguments
 */

import { Success, Failure, type Result } from '../domain/types/index.js';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse tool arguments typed by a user; blank input means no arguments
 */
export function parseToolArguments(input: string): Result<Record<string, unknown>> {
  if (input.trim() === '') {
    return Success({});
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(input);
  } catch (error) {
    return Failure(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!isPlainObject(parsed)) {
    return Failure('Parameters must be a JSON object');
  }
  return Success(parsed);
}
