import { ValidationError } from '@/errors';

/**
 * Positive integer id from a route parameter
 *
 * @throws ValidationError when the value is missing, fractional or not positive
 */
export function parseIdParam(value: string | undefined, name: string): number {
  const parsed = value !== undefined && /^\d+$/.test(value) ? Number(value) : NaN;

  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new ValidationError(`Invalid ${name}`);
  }
  return parsed;
}
