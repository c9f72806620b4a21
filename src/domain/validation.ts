import { ValidationError } from './errors.js';

/**
 * Trim a required string field, rejecting blank values.
 */
export function requireText(value: string, field: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(`${field} is required`, field);
  }
  return trimmed;
}

export function maxLength(value: string | null, limit: number, field: string): string | null {
  if (value !== null && value.length > limit) {
    throw new ValidationError(`${field} cannot exceed ${limit} characters`, field);
  }
  return value;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Calendar dates travel as `YYYY-MM-DD` strings, so they compare correctly
 * as plain strings and never shift with the server timezone.
 */
export function requireIsoDate(value: string, field: string): string {
  if (!ISO_DATE.test(value)) {
    throw new ValidationError(`${field} must be a date in YYYY-MM-DD format`, field);
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  if (Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== value) {
    throw new ValidationError(`${field} is not a valid calendar date`, field);
  }
  return value;
}

export function requireOneOf<T extends string>(
  value: string,
  allowed: readonly T[],
  field: string
): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ValidationError(`${field} must be one of: ${allowed.join(', ')}`, field);
  }
  return match;
}

export function requireInteger(value: number, field: string): number {
  if (!Number.isInteger(value)) {
    throw new ValidationError(`${field} must be an integer`, field);
  }
  return value;
}
