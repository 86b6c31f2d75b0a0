/**
 * Input validation for CLI arguments.
 */

import { format, isValid, parse } from 'date-fns';
import { Result } from './result';

/**
 * Validate a calendar date in YYYY-MM-DD form. Rejects dates that do not
 * exist (Feb 30, month 13).
 */
export function validateIsoDate(input: string | undefined, fieldName = 'date'): Result<string> {
  if (!input) {
    return Result.err(`${fieldName} is required`);
  }

  if (!/^\d{4}-\d{2}-\d{2}$/.test(input)) {
    return Result.err(`${fieldName} must be YYYY-MM-DD format (got: "${input}")`);
  }

  const date = parse(input, 'yyyy-MM-dd', new Date(0));
  if (!isValid(date) || format(date, 'yyyy-MM-dd') !== input) {
    return Result.err(`${fieldName} is not a valid date: "${input}"`);
  }

  return Result.ok(input);
}
